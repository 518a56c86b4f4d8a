import { ChromaClient, type Collection, type IEmbeddingFunction } from "chromadb";
import type { FilterOperators, VectorFilter, VectorMetadata } from "../types";
import type { VectorEntry, VectorIndex, VectorIndexStats, VectorMatch, VectorQuery } from "./vectorIndex";

type ChromaWhere = NonNullable<Parameters<Collection["query"]>[0]["where"]>;

// Vectors are always computed before they reach Chroma.
const precomputedOnly: IEmbeddingFunction = {
  async generate(): Promise<number[][]> {
    throw new Error("ChromaVectorIndex only accepts precomputed embeddings");
  },
};

export class ChromaVectorIndex implements VectorIndex {
  readonly type = "ChromaDB";
  private client: ChromaClient;
  private collections: Map<string, Collection> = new Map();

  constructor(path: string) {
    this.client = new ChromaClient({ path });
  }

  private async getCollection(namespace: string): Promise<Collection> {
    const cached = this.collections.get(namespace);
    if (cached) return cached;

    const collection = await this.client.getOrCreateCollection({
      name: namespace,
      embeddingFunction: precomputedOnly,
      metadata: {
        "hnsw:space": "cosine",
        created_at: new Date().toISOString(),
      },
    });
    this.collections.set(namespace, collection);
    return collection;
  }

  async upsert(namespace: string, entries: VectorEntry[]): Promise<void> {
    if (entries.length === 0) return;
    const collection = await this.getCollection(namespace);
    const ingestedAt = new Date().toISOString();
    await collection.upsert({
      ids: entries.map((e) => e.id),
      embeddings: entries.map((e) => e.values),
      // Chroma rejects empty metadata objects
      metadatas: entries.map((e) => ({ ...e.metadata, ingested_at: ingestedAt })),
    });
  }

  async query({ namespace, vector, topK, filter }: VectorQuery): Promise<VectorMatch[]> {
    const collection = await this.getCollection(namespace);
    const results = await collection.query({
      queryEmbeddings: [vector],
      nResults: topK,
      where: toWhere(filter),
    });

    const ids = results.ids?.[0] ?? [];
    const metadatas = results.metadatas?.[0] ?? [];
    const distances = results.distances?.[0] ?? [];

    return ids.map((id, i) => ({
      id,
      score: 1 - (distances[i] ?? 0), // cosine distance to similarity
      metadata: toMetadata(metadatas[i]),
    }));
  }

  async delete(namespace: string, ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    const collection = await this.getCollection(namespace);
    await collection.delete({ ids });
  }

  // Clearing a namespace that was never written is not an error.
  async clear(namespace: string): Promise<void> {
    await this.getCollection(namespace);
    await this.client.deleteCollection({ name: namespace });
    this.collections.delete(namespace);
  }

  async stats(namespace: string): Promise<VectorIndexStats> {
    const collection = await this.getCollection(namespace);
    const count = await collection.count();
    return { type: this.type, namespace, count };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.heartbeat();
      return true;
    } catch (error) {
      console.error("ChromaDB health check failed:", error);
      return false;
    }
  }
}

// Chroma accepts a single predicate per object: every field, and every operator
// on a field, becomes its own clause under $and.
export function toWhere(filter?: VectorFilter): ChromaWhere | undefined {
  if (!filter) return undefined;
  const clauses: ChromaWhere[] = Object.entries(filter).flatMap<ChromaWhere>(([field, condition]) =>
    typeof condition === "object" ? splitOperators(condition).map((op) => ({ [field]: op })) : [{ [field]: condition }]
  );
  if (clauses.length === 0) return undefined;
  if (clauses.length === 1) return clauses[0];
  return { $and: clauses };
}

function splitOperators(condition: FilterOperators): FilterOperators[] {
  const { $eq, $ne, $gt, $gte, $lt, $lte, $in, $nin } = condition;
  const parts: FilterOperators[] = [];
  if ($eq !== undefined) parts.push({ $eq });
  if ($ne !== undefined) parts.push({ $ne });
  if ($gt !== undefined) parts.push({ $gt });
  if ($gte !== undefined) parts.push({ $gte });
  if ($lt !== undefined) parts.push({ $lt });
  if ($lte !== undefined) parts.push({ $lte });
  if ($in !== undefined) parts.push({ $in });
  if ($nin !== undefined) parts.push({ $nin });
  return parts;
}

function toMetadata(raw: Record<string, unknown> | null | undefined): VectorMetadata {
  const out: VectorMetadata = {};
  for (const [key, value] of Object.entries(raw ?? {})) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      out[key] = value;
    }
  }
  return out;
}
