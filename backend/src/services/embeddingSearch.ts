import { callBackend, InvalidQuery } from "../errors";
import type { SearchOptions, StoredDocument, Vector } from "../types";
import type { EngineBackends } from "./embeddingStore";

export type SearchDefaults = {
  topK: number;
  cutoff: number;
};

export type SearchHit = {
  embeddingId: string;
  score: number;
  document: StoredDocument;
};

export type SearchReport = {
  hits: SearchHit[];
  /** Ids that passed the cutoff but no longer resolve to a document. */
  lostIds: string[];
};

export const DEFAULT_SEARCH: SearchDefaults = { topK: 10, cutoff: 0.4 };

/**
 * Similarity search that joins vector matches back to their owning documents.
 *
 * The vector index, the registry and the owning collections can drift apart.
 * A match whose registry record or document is gone is dropped from the
 * results and deleted from the index in the same namespace. Matches at or
 * below the cutoff are discarded before resolution and never repaired.
 */
export class EmbeddingSearch {
  constructor(
    private readonly backends: EngineBackends,
    private readonly defaults: SearchDefaults = DEFAULT_SEARCH
  ) {}

  async search(
    vector: Vector | null | undefined,
    indexNamespace: string,
    options: SearchOptions = {}
  ): Promise<StoredDocument[]> {
    const report = await this.searchDetailed(vector, indexNamespace, options);
    return report.hits.map((h) => h.document);
  }

  async searchDetailed(
    vector: Vector | null | undefined,
    indexNamespace: string,
    options: SearchOptions = {}
  ): Promise<SearchReport> {
    if (!vector || vector.length === 0) throw new InvalidQuery();
    const { k = this.defaults.topK, filter, cutoff = this.defaults.cutoff } = options;
    if (!Number.isInteger(k) || k < 1) throw new InvalidQuery(`k must be a positive integer, got ${k}`);
    const { vectorIndex, timeoutMs } = this.backends;

    const matches = await callBackend("vector-index", "query", timeoutMs, () =>
      vectorIndex.query({ namespace: indexNamespace, vector, topK: k, filter })
    );
    const candidates = matches.filter((m) => m.score > cutoff);

    const resolved = await Promise.all(candidates.map((m) => this.resolve(m.id)));

    const hits: SearchHit[] = [];
    const lostIds: string[] = [];
    candidates.forEach((match, i) => {
      const document = resolved[i];
      if (document) hits.push({ embeddingId: match.id, score: match.score, document });
      else lostIds.push(match.id);
    });

    if (lostIds.length > 0) await this.scrub(indexNamespace, lostIds);

    return { hits, lostIds };
  }

  private async resolve(embeddingId: string): Promise<StoredDocument | null> {
    const { registry, documents, timeoutMs } = this.backends;
    const record = await callBackend("document-store", "registry.get", timeoutMs, () => registry.get(embeddingId));
    if (!record) return null;
    return callBackend("document-store", "findOne", timeoutMs, () =>
      documents.findOne(record.owningTable, { _id: record.owningId })
    );
  }

  // Best effort: a failed delete leaves the ids to be found again next search.
  private async scrub(indexNamespace: string, lostIds: string[]): Promise<void> {
    console.warn(`Lost ${lostIds.length} objects in search of "${indexNamespace}". Scrubbing from vector index.`);
    const { vectorIndex, timeoutMs } = this.backends;
    try {
      await callBackend("vector-index", "delete", timeoutMs, () => vectorIndex.delete(indexNamespace, lostIds));
    } catch (err) {
      console.error(`Failed to scrub ${lostIds.length} dangling ids from "${indexNamespace}":`, err);
    }
  }
}
