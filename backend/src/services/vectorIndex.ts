import type { Vector, VectorFilter, VectorMetadata } from "../types";

export type VectorEntry = {
  id: string;
  values: Vector;
  metadata: VectorMetadata;
};

export type VectorMatch = {
  id: string;
  score: number;
  metadata: VectorMetadata;
};

export type VectorQuery = {
  namespace: string;
  vector: Vector;
  topK: number;
  filter?: VectorFilter;
};

export type VectorIndexStats = {
  type: string;
  namespace: string;
  count: number;
};

/**
 * Namespaced nearest-neighbour index. `query` returns matches ordered by
 * descending similarity score.
 */
export interface VectorIndex {
  readonly type: string;
  upsert(namespace: string, entries: VectorEntry[]): Promise<void>;
  query(input: VectorQuery): Promise<VectorMatch[]>;
  delete(namespace: string, ids: string[]): Promise<void>;
  clear(namespace: string): Promise<void>;
  stats(namespace: string): Promise<VectorIndexStats>;
}
