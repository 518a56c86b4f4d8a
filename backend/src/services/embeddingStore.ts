import { callBackend, InvalidEmbedding, InvalidOwner } from "../errors";
import type { Owner, StoreInput } from "../types";
import type { DocumentStore } from "./documentStore";
import type { EmbeddingRegistry } from "./embeddingRegistry";
import type { VectorIndex } from "./vectorIndex";

export type EngineBackends = {
  vectorIndex: VectorIndex;
  documents: DocumentStore;
  registry: EmbeddingRegistry;
  timeoutMs: number;
};

/**
 * Writes an embedding: find-or-create the owning document, record the
 * embedding in the registry, then upsert the vector. The registry write and the
 * upsert are separate calls; a failed upsert leaves a record no search reaches.
 */
export class EmbeddingStore {
  constructor(private readonly backends: EngineBackends) {}

  async store(input: StoreInput): Promise<string> {
    const { vector, owningTable, owner, metadata = {} } = input;
    if (vector.length === 0) throw new InvalidEmbedding();
    const indexNamespace = input.indexNamespace ?? owningTable;
    const { vectorIndex, registry, timeoutMs } = this.backends;

    const owningId = await this.resolveOwner(owningTable, owner);

    const embeddingId = await callBackend("document-store", "registry.put", timeoutMs, () =>
      registry.put({ vector, owningTable, owningId })
    );

    await callBackend("vector-index", "upsert", timeoutMs, () =>
      vectorIndex.upsert(indexNamespace, [{ id: embeddingId, values: vector, metadata }])
    );

    return embeddingId;
  }

  /** Returns the id of the owning document, inserting it when `owner.info` matches nothing. */
  async resolveOwner(owningTable: string, owner: Owner): Promise<string> {
    if ("id" in owner) return owner.id;
    if (Object.keys(owner.info).length === 0) throw new InvalidOwner();
    if (hasOperatorKey(owner.info)) throw new InvalidOwner("Owner info fields may not start with '$'");

    const { documents, timeoutMs } = this.backends;
    const existing = await callBackend("document-store", "findOne", timeoutMs, () =>
      documents.findOne(owningTable, owner.info)
    );
    if (existing) return existing._id;

    return callBackend("document-store", "insertOne", timeoutMs, () => documents.insertOne(owningTable, owner.info));
  }
}

// Owner info is matched by equality; a `$` key anywhere would read as a query operator.
function hasOperatorKey(value: unknown): boolean {
  if (Array.isArray(value)) return value.some(hasOperatorKey);
  if (value === null || typeof value !== "object" || value instanceof Date) return false;
  return Object.entries(value).some(([key, nested]) => key.startsWith("$") || hasOperatorKey(nested));
}
