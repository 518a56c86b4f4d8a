import { callBackend, UnknownActorType } from "../errors";
import type { DocumentQuery } from "../types";
import type { DocumentStore } from "./documentStore";

export const ACTORS_NAMESPACE = "actors";
export const BASE_ACTOR_TAG = "Actor";

export type ActorData = Record<string, unknown>;

type ActorStorage = {
  documents: DocumentStore;
  timeoutMs: number;
  namespace: string;
};

export type ActorInit = {
  storage: ActorStorage;
  tag: string;
  data: ActorData;
  id?: string;
  canLeave: boolean;
};

export type ActorFactory = (init: ActorInit) => Actor;

/**
 * A conversation participant whose attributes live in the document store.
 * Subclasses add behaviour and are registered under a tag so that `load`
 * rebuilds the right class.
 */
export class Actor {
  readonly tag: string;
  readonly canLeave: boolean;
  private readonly storage: ActorStorage;
  private readonly data: ActorData;
  private actorId?: string;

  constructor(init: ActorInit) {
    this.storage = init.storage;
    this.tag = init.tag;
    this.data = { ...init.data };
    this.actorId = init.id;
    this.canLeave = init.canLeave;
  }

  get id(): string | undefined {
    return this.actorId;
  }

  has(name: string): boolean {
    return name in this.data;
  }

  get(name: string): unknown {
    return this.data[name];
  }

  attributes(): ActorData {
    return { ...this.data };
  }

  /** Sets an attribute, writing it through when the actor has been saved. */
  async set(name: string, value: unknown): Promise<void> {
    this.data[name] = value;
    const id = this.actorId;
    if (id === undefined) return;
    await this.write("update", (docs, ns) => docs.updateOne(ns, { _id: id }, { [name]: value }));
  }

  async save(): Promise<string> {
    const id = this.actorId;
    if (id !== undefined) {
      await this.write("update", (docs, ns) => docs.updateOne(ns, { _id: id }, { ...this.data }));
      return id;
    }
    const doc: DocumentQuery = { ...this.data, type: this.tag };
    const inserted = await this.write("insert", (docs, ns) => docs.insertOne(ns, doc));
    this.actorId = inserted;
    return inserted;
  }

  private write<T>(op: string, fn: (docs: DocumentStore, namespace: string) => Promise<T>): Promise<T> {
    const { documents, namespace, timeoutMs } = this.storage;
    return callBackend("document-store", `actors.${op}`, timeoutMs, () => fn(documents, namespace));
  }
}

/**
 * Tag to constructor mapping, filled at start-up. The base `Actor` is always
 * registered.
 */
export class ActorRegistry {
  private readonly factories = new Map<string, ActorFactory>();
  private readonly storage: ActorStorage;

  constructor(documents: DocumentStore, timeoutMs: number, namespace: string = ACTORS_NAMESPACE) {
    this.storage = { documents, timeoutMs, namespace };
    this.register(BASE_ACTOR_TAG, (init) => new Actor(init));
  }

  /** Registering a tag again replaces its factory. */
  register(tag: string, factory: ActorFactory): this {
    this.factories.set(tag, factory);
    return this;
  }

  unregister(tag: string): boolean {
    if (tag === BASE_ACTOR_TAG) return false;
    return this.factories.delete(tag);
  }

  has(tag: string): boolean {
    return this.factories.has(tag);
  }

  tags(): string[] {
    return [...this.factories.keys()];
  }

  /** A new, unsaved actor. */
  create(tag: string, data: ActorData = {}, options: { canLeave?: boolean } = {}): Actor {
    return this.build({ tag, data, canLeave: options.canLeave ?? true });
  }

  async load(id: string, options: { canLeave?: boolean } = {}): Promise<Actor | null> {
    const { documents, namespace, timeoutMs } = this.storage;
    const doc = await callBackend("document-store", "actors.load", timeoutMs, () =>
      documents.findOne(namespace, { _id: id })
    );
    if (!doc) return null;

    const { _id, type, ...data } = doc;
    const tag = typeof type === "string" ? type : BASE_ACTOR_TAG;
    return this.build({ tag, data, id: _id, canLeave: options.canLeave ?? true });
  }

  private build(init: Omit<ActorInit, "storage">): Actor {
    const factory = this.factories.get(init.tag);
    if (!factory) throw new UnknownActorType(init.tag);
    return factory({ ...init, storage: this.storage });
  }
}
