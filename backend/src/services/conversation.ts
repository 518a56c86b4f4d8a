import { z } from "zod";
import { AppError, callBackend } from "../errors";
import type { DocumentQuery } from "../types";
import type { DocumentStore } from "./documentStore";
import type { ChatMessage, ChatRole } from "./llm";
import type { UsageLedger } from "./usage";

export const CONVERSATIONS_NAMESPACE = "convos";
export const MESSAGES_NAMESPACE = "messages";

export type ConversationMessage = {
  id: string;
  conversationId: string;
  role: string;
  message: string;
  at: Date;
  meta: Record<string, unknown>;
};

export type FormatOptions = {
  start?: number;
  end?: number;
  numbered?: boolean;
};

/** A message index (negative counts from the end) or a message id, inclusive. */
export type SliceEnd = number | string;

type ConversationStorage = {
  documents: DocumentStore;
  timeoutMs: number;
  ledger: UsageLedger;
};

const StoredMessageSchema = z
  .object({
    _id: z.string(),
    convo: z.string(),
    role: z.string(),
    message: z.string(),
    at: z.coerce.date(),
  })
  .passthrough();

const CHAT_ROLES: readonly string[] = ["system", "user", "assistant"] satisfies ChatRole[];

function isChatRole(role: string): role is ChatRole {
  return CHAT_ROLES.includes(role);
}

export class Conversations {
  private readonly storage: ConversationStorage;

  constructor(documents: DocumentStore, timeoutMs: number, ledger: UsageLedger) {
    this.storage = { documents, timeoutMs, ledger };
  }

  async create(fields: DocumentQuery = {}): Promise<Conversation> {
    const { documents, timeoutMs } = this.storage;
    const id = await callBackend("document-store", "convos.insert", timeoutMs, () =>
      documents.insertOne(CONVERSATIONS_NAMESPACE, { finished: false, ...fields })
    );
    return new Conversation(this.storage, id, []);
  }

  async load(id: string): Promise<Conversation | null> {
    const { documents, timeoutMs } = this.storage;
    const convo = await callBackend("document-store", "convos.find", timeoutMs, () =>
      documents.findOne(CONVERSATIONS_NAMESPACE, { _id: id })
    );
    if (!convo) return null;

    const docs = await callBackend("document-store", "messages.find", timeoutMs, () =>
      documents.find(MESSAGES_NAMESPACE, { convo: convo._id })
    );
    const messages = docs.map(toMessage).sort((a, b) => a.at.getTime() - b.at.getTime());
    return new Conversation(this.storage, convo._id, messages);
  }

  /** The conversation as it stood up to and including `end`. */
  async loadSlice(id: string, end: SliceEnd): Promise<Conversation | null> {
    const full = await this.load(id);
    if (!full) return null;
    const all = full.messages;

    let stop: number;
    if (typeof end === "number") {
      stop = end < 0 ? all.length + end : end;
    } else {
      const idx = all.findIndex((m) => m.id === end);
      if (idx < 0) throw new AppError(`Message ${end} is not part of conversation ${id}`, "MESSAGE_NOT_FOUND", 404);
      stop = idx + 1;
    }
    return new Conversation(this.storage, full.id, all.slice(0, Math.max(0, stop)));
  }
}

function toMessage(doc: unknown): ConversationMessage {
  const { _id, convo, role, message, at, ...meta } = StoredMessageSchema.parse(doc);
  return { id: _id, conversationId: convo, role, message, at, meta };
}

export class Conversation {
  private readonly history: ConversationMessage[];

  constructor(
    private readonly storage: ConversationStorage,
    readonly id: string,
    messages: ConversationMessage[]
  ) {
    this.history = [...messages];
  }

  get messages(): ConversationMessage[] {
    return [...this.history];
  }

  async say(role: string, message: string, meta: Record<string, unknown> = {}): Promise<ConversationMessage> {
    const at = new Date();
    const { documents, timeoutMs } = this.storage;
    const messageId = await callBackend("document-store", "messages.insert", timeoutMs, () =>
      documents.insertOne(MESSAGES_NAMESPACE, { ...meta, convo: this.id, role, message, at })
    );
    const saved: ConversationMessage = { id: messageId, conversationId: this.id, role, message, at, meta: { ...meta } };
    this.history.push(saved);
    return saved;
  }

  async get(name: string): Promise<unknown> {
    const { documents, timeoutMs } = this.storage;
    const convo = await callBackend("document-store", "convos.find", timeoutMs, () =>
      documents.findOne(CONVERSATIONS_NAMESPACE, { _id: this.id })
    );
    return convo?.[name];
  }

  async set(name: string, value: unknown): Promise<void> {
    const { documents, timeoutMs } = this.storage;
    await callBackend("document-store", "convos.update", timeoutMs, () =>
      documents.updateOne(CONVERSATIONS_NAMESPACE, { _id: this.id }, { [name]: value })
    );
  }

  async delete(): Promise<void> {
    const { documents, timeoutMs } = this.storage;
    await callBackend("document-store", "convos.delete", timeoutMs, () =>
      documents.deleteMany(CONVERSATIONS_NAMESPACE, { _id: this.id })
    );
    await callBackend("document-store", "messages.delete", timeoutMs, () =>
      documents.deleteMany(MESSAGES_NAMESPACE, { convo: this.id })
    );
    this.history.length = 0;
  }

  /** Dollars spent on model calls recorded under this conversation. */
  totalCost(): Promise<number> {
    return this.storage.ledger.totalCost(this.id);
  }

  /** Chat history for the model; roles it does not know are spoken as the user. */
  toChat(): ChatMessage[] {
    return this.history.map((m): ChatMessage =>
      isChatRole(m.role) ? { role: m.role, content: m.message } : { role: "user", content: `${m.role}: ${m.message}` }
    );
  }

  format(options: FormatOptions = {}): string {
    const { start = 0, end = this.history.length, numbered = false } = options;
    const shown = this.history.slice(start, end);
    if (shown.length === 0) return "(no conversation yet)";

    const line = (m: ConversationMessage, i: number) =>
      numbered ? `${i + 1} = ${m.role}: ${m.message}` : `${m.role}: ${m.message}`;

    const earlier = shown.slice(0, -1);
    const hist = earlier.length === 0 ? "(start of conversation)" : earlier.map(line).join("\n");
    const last = shown[shown.length - 1];
    return `${hist}\n\nMost Recent Message:\n${line(last, shown.length - 1)}`;
  }
}
