import { MongoClient, ObjectId, type Db, type Document, type Filter } from "mongodb";
import type { DocumentQuery, StoredDocument } from "../types";
import type { DocumentStore } from "./documentStore";

export class MongoDocumentStore implements DocumentStore {
  readonly type = "MongoDB";
  private readonly client: MongoClient;
  private readonly db: Db;

  constructor(uri: string, dbName: string) {
    this.client = new MongoClient(uri);
    this.db = this.client.db(dbName);
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  async findOne(namespace: string, query: DocumentQuery): Promise<StoredDocument | null> {
    const doc = await this.db.collection(namespace).findOne(toFilter(query));
    return doc ? { ...doc, _id: idToString(doc._id) } : null;
  }

  async find(namespace: string, query: DocumentQuery): Promise<StoredDocument[]> {
    const docs = await this.db.collection(namespace).find(toFilter(query)).sort({ $natural: 1 }).toArray();
    return docs.map((doc) => ({ ...doc, _id: idToString(doc._id) }));
  }

  async insertOne(namespace: string, doc: DocumentQuery): Promise<string> {
    // the driver writes the generated _id back into the object it is given
    const res = await this.db.collection(namespace).insertOne({ ...doc });
    return idToString(res.insertedId);
  }

  async updateOne(namespace: string, query: DocumentQuery, fields: DocumentQuery): Promise<boolean> {
    const { _id: _ignored, ...rest } = fields;
    const res = await this.db.collection(namespace).updateOne(toFilter(query), { $set: rest });
    return res.matchedCount > 0;
  }

  async deleteMany(namespace: string, query: DocumentQuery): Promise<number> {
    const res = await this.db.collection(namespace).deleteMany(toFilter(query));
    return res.deletedCount;
  }
}

function idToString(id: unknown): string {
  return id instanceof ObjectId ? id.toHexString() : String(id);
}

// Ids leave this module as strings; match every form they may have had on the
// way back in. Other fields compare by equality only.
export function toFilter(query: DocumentQuery): Filter<Document> {
  const filter: Filter<Document> = {};
  for (const [field, value] of Object.entries(query)) {
    filter[field] = field === "_id" && typeof value === "string" ? { $in: idCandidates(value) } : { $eq: value };
  }
  return filter;
}

function idCandidates(id: string): unknown[] {
  const candidates: unknown[] = [id];
  if (id.length === 24 && ObjectId.isValid(id)) candidates.unshift(new ObjectId(id));
  const numeric = Number(id);
  if (id !== "" && Number.isFinite(numeric) && String(numeric) === id) candidates.push(numeric);
  return candidates;
}
