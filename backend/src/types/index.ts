export type Vector = number[];

export type MetadataValue = string | number | boolean;

export type VectorMetadata = Record<string, MetadataValue>;

export type FilterOperators = {
  $eq?: MetadataValue;
  $ne?: MetadataValue;
  $gt?: number;
  $gte?: number;
  $lt?: number;
  $lte?: number;
  $in?: MetadataValue[];
  $nin?: MetadataValue[];
};

// Field-level metadata predicate, passed through to the vector index as-is.
export type VectorFilter = Record<string, MetadataValue | FilterOperators>;

export type StoredDocument = {
  _id: string;
  [field: string]: unknown;
};

export type DocumentQuery = Record<string, unknown>;

export type EmbeddingRecord = {
  id: string;
  vector: Vector;
  owningTable: string;
  owningId: string;
};

export type Owner = { id: string } | { info: DocumentQuery };

export type StoreInput = {
  vector: Vector;
  owningTable: string;
  owner: Owner;
  indexNamespace?: string;
  metadata?: VectorMetadata;
};

export type SearchOptions = {
  k?: number;
  filter?: VectorFilter;
  cutoff?: number;
};
