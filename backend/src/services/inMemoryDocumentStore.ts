import { randomUUID } from "crypto";
import { isDeepStrictEqual } from "util";
import type { DocumentQuery, StoredDocument } from "../types";
import type { DocumentStore } from "./documentStore";

type InMemoryDocumentOptions = {
  generateId?: (namespace: string) => string;
};

export class InMemoryDocumentStore implements DocumentStore {
  readonly type = "In-Memory";
  private readonly collections = new Map<string, StoredDocument[]>();
  private readonly generateId: (namespace: string) => string;

  constructor(options: InMemoryDocumentOptions = {}) {
    this.generateId = options.generateId ?? (() => randomUUID());
  }

  async findOne(namespace: string, query: DocumentQuery): Promise<StoredDocument | null> {
    const found = this.collection(namespace).find((doc) => matches(doc, query));
    return found ? structuredClone(found) : null;
  }

  async find(namespace: string, query: DocumentQuery): Promise<StoredDocument[]> {
    return this.collection(namespace)
      .filter((doc) => matches(doc, query))
      .map((doc) => structuredClone(doc));
  }

  async insertOne(namespace: string, doc: DocumentQuery): Promise<string> {
    const _id = doc._id === undefined || doc._id === null ? this.generateId(namespace) : String(doc._id);
    this.collection(namespace).push({ ...structuredClone(doc), _id });
    return _id;
  }

  async updateOne(namespace: string, query: DocumentQuery, fields: DocumentQuery): Promise<boolean> {
    const list = this.collection(namespace);
    const idx = list.findIndex((doc) => matches(doc, query));
    if (idx < 0) return false;
    const { _id: _ignored, ...rest } = structuredClone(fields);
    list[idx] = { ...list[idx], ...rest };
    return true;
  }

  async deleteMany(namespace: string, query: DocumentQuery): Promise<number> {
    const list = this.collection(namespace);
    const kept = list.filter((doc) => !matches(doc, query));
    this.collections.set(namespace, kept);
    return list.length - kept.length;
  }

  count(namespace: string): number {
    return this.collection(namespace).length;
  }

  private collection(namespace: string): StoredDocument[] {
    let list = this.collections.get(namespace);
    if (!list) {
      list = [];
      this.collections.set(namespace, list);
    }
    return list;
  }
}

// Stored ids are strings, so a numeric `_id` in a query matches its string form.
function matches(doc: StoredDocument, query: DocumentQuery): boolean {
  return Object.entries(query).every(([field, value]) =>
    field === "_id" && typeof value === "number" ? doc._id === String(value) : isDeepStrictEqual(doc[field], value)
  );
}
