import { z } from "zod";
import { CorruptRecord } from "../errors";
import type { EmbeddingRecord } from "../types";
import type { DocumentStore } from "./documentStore";

export const REGISTRY_NAMESPACE = "embeddings";

const StoredRecordSchema = z.object({
  _id: z.string(),
  vector: z.array(z.number()).min(1),
  owning_table: z.string().min(1),
  owning_id: z.string().min(1),
});

/**
 * Join table from an embedding id to the document that owns it. Records are
 * written once and never updated.
 */
export class EmbeddingRegistry {
  constructor(
    private readonly documents: DocumentStore,
    readonly namespace: string = REGISTRY_NAMESPACE
  ) {}

  async put(record: Omit<EmbeddingRecord, "id">): Promise<string> {
    return this.documents.insertOne(this.namespace, {
      vector: record.vector,
      owning_table: record.owningTable,
      owning_id: record.owningId,
    });
  }

  async get(id: string): Promise<EmbeddingRecord | null> {
    const doc = await this.documents.findOne(this.namespace, { _id: id });
    if (!doc) return null;
    const parsed = StoredRecordSchema.safeParse(doc);
    if (!parsed.success) {
      throw new CorruptRecord(this.namespace, id, parsed.error.issues.map((i) => i.message).join(", "));
    }
    const { _id, vector, owning_table, owning_id } = parsed.data;
    return { id: _id, vector, owningTable: owning_table, owningId: owning_id };
  }
}
