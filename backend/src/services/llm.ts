import { GoogleGenerativeAI, type Content } from "@google/generative-ai";
import type { AppConfig } from "../config";
import { AppError, callBackend, ResponseValidationFailed } from "../errors";
import { validateResponse, type ResponseKind } from "../validation/responseValidator";
import type { TokenUsage, UsageLedger } from "./usage";

export type ChatRole = "system" | "user" | "assistant";
export type ChatMessage = { role: ChatRole; content: string };
export type MessagesInput = string | ChatMessage[] | Array<[ChatRole, string]>;

export type Completion = {
  content: string;
  usage: TokenUsage;
};

export interface LanguageModel {
  readonly name: string;
  /** Provider model id, used for pricing. */
  readonly model: string;
  complete(messages: ChatMessage[]): Promise<Completion>;
}

export type AskOptions = {
  /** Usage of this call is recorded under this group, e.g. a conversation id. */
  group?: string;
};

const TEMPERATURE = 0.2;

export class GeminiLanguageModel implements LanguageModel {
  readonly name: string;
  private client: GoogleGenerativeAI | null = null;

  constructor(private readonly apiKey: string, readonly model: string) {
    this.name = `gemini:${model}`;
  }

  private getClient(): GoogleGenerativeAI {
    if (!this.client) this.client = new GoogleGenerativeAI(this.apiKey);
    return this.client;
  }

  async complete(messages: ChatMessage[]): Promise<Completion> {
    const system = messages.filter((m) => m.role === "system").map((m) => m.content);
    const contents: Content[] = messages
      .filter((m) => m.role !== "system")
      .map((m) => ({ role: m.role === "assistant" ? "model" : "user", parts: [{ text: m.content }] }));

    const model = this.getClient().getGenerativeModel({
      model: this.model,
      ...(system.length > 0 ? { systemInstruction: system.join("\n\n") } : {}),
    });
    const result = await model.generateContent({
      contents,
      generationConfig: { temperature: TEMPERATURE },
    });
    const usage = result.response.usageMetadata;
    return {
      content: result.response.text(),
      usage: { promptTokens: usage?.promptTokenCount ?? 0, completionTokens: usage?.candidatesTokenCount ?? 0 },
    };
  }
}

/** Stand-in used when no API key is configured. */
export class EchoLanguageModel implements LanguageModel {
  readonly name = "echo";
  readonly model = "echo";

  async complete(messages: ChatMessage[]): Promise<Completion> {
    const last = messages[messages.length - 1];
    return {
      content: `LLM unavailable. Heuristic answer based on prompt and context.\n\n${last.content.slice(0, 500)}`,
      usage: { promptTokens: 0, completionTokens: 0 },
    };
  }
}

export function toMessages(input: MessagesInput): ChatMessage[] {
  if (typeof input === "string") return [{ role: "user", content: input }];
  const items: Array<ChatMessage | [ChatRole, string]> = input;
  return items.map((m) => (Array.isArray(m) ? { role: m[0], content: m[1] } : { ...m }));
}

export class LlmClient {
  constructor(
    private readonly model: LanguageModel,
    private readonly timeoutMs: number,
    private readonly ledger?: UsageLedger
  ) {}

  get modelName(): string {
    return this.model.name;
  }

  async ask(input: MessagesInput, options: AskOptions = {}): Promise<string> {
    const messages = toMessages(input);
    if (messages.length === 0) throw new AppError("No messages to send", "EMPTY_PROMPT", 400);
    const completion = await callBackend("language-model", "complete", this.timeoutMs, () =>
      this.model.complete(messages)
    );
    if (this.ledger) await this.ledger.record(this.model.model, completion.usage, options.group ?? null);
    return completion.content;
  }

  /**
   * Asks until the answer parses as `kind`. Each rejected answer goes back to
   * the model followed by the reason it was rejected.
   */
  async askValid<T>(
    input: MessagesInput,
    kind: ResponseKind<T>,
    options: AskOptions & { attempts?: number } = {}
  ): Promise<T | null> {
    const attempts = Math.max(1, options.attempts ?? 3);
    const history = toMessages(input);
    let lastReason = "";

    for (let i = 0; i < attempts; i++) {
      const answer = await this.ask(history, { group: options.group });
      const result = validateResponse(answer, kind);
      if (result.ok) return result.value;
      lastReason = result.reason;
      history.push({ role: "assistant", content: answer }, { role: "user", content: result.reason });
    }

    throw new ResponseValidationFailed(attempts, lastReason);
  }
}

export function createLanguageModel(config: AppConfig): LanguageModel {
  if (!config.googleApiKey) return new EchoLanguageModel();
  return new GeminiLanguageModel(config.googleApiKey, config.chatModel);
}
