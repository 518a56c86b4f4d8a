import { callBackend, InvalidQuery } from "../errors";
import type { SearchOptions, StoreInput, StoredDocument, Vector } from "../types";
import { normalizeText } from "../utils/normalize";
import type { EmbeddingSearch, SearchReport } from "./embeddingSearch";
import type { EmbeddingGenerator } from "./embeddings";
import type { EmbeddingStore } from "./embeddingStore";

export type EmbeddingEngines = {
  generator: EmbeddingGenerator;
  store: EmbeddingStore;
  search: EmbeddingSearch;
  timeoutMs: number;
};

/**
 * A vector bound to the engines that store and search it. Built either from
 * text, which is normalized and embedded, or from a precomputed vector.
 */
export class Embedding {
  private constructor(
    private readonly engines: EmbeddingEngines,
    readonly vector: Vector,
    readonly text?: string
  ) {}

  static async fromText(engines: EmbeddingEngines, text: string): Promise<Embedding> {
    const normalized = normalizeText(text);
    if (normalized === "") throw new InvalidQuery("No text to embed");
    const vector = await callBackend("embedding-generator", "embed", engines.timeoutMs, () =>
      engines.generator.embed(normalized)
    );
    return new Embedding(engines, vector, normalized);
  }

  static fromVector(engines: EmbeddingEngines, vector: Vector): Embedding {
    return new Embedding(engines, vector);
  }

  store(input: Omit<StoreInput, "vector">): Promise<string> {
    return this.engines.store.store({ ...input, vector: this.vector });
  }

  search(indexNamespace: string, options?: SearchOptions): Promise<StoredDocument[]> {
    return this.engines.search.search(this.vector, indexNamespace, options);
  }

  searchDetailed(indexNamespace: string, options?: SearchOptions): Promise<SearchReport> {
    return this.engines.search.searchDetailed(this.vector, indexNamespace, options);
  }
}
