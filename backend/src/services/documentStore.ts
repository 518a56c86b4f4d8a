import type { DocumentQuery, StoredDocument } from "../types";

/**
 * Namespaced document storage. Queries are equality matches on top-level
 * fields; `_id` is matched against the store's generated identifier.
 */
export interface DocumentStore {
  readonly type: string;
  findOne(namespace: string, query: DocumentQuery): Promise<StoredDocument | null>;
  /** Every match, in insertion order. */
  find(namespace: string, query: DocumentQuery): Promise<StoredDocument[]>;
  insertOne(namespace: string, doc: DocumentQuery): Promise<string>;
  /** Sets `fields` on the first match; false when nothing matched. */
  updateOne(namespace: string, query: DocumentQuery, fields: DocumentQuery): Promise<boolean>;
  deleteMany(namespace: string, query: DocumentQuery): Promise<number>;
}
