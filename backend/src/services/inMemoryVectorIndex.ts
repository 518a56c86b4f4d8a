import fs from "fs";
import path from "path";
import { z } from "zod";
import type { FilterOperators, MetadataValue, Vector, VectorFilter, VectorMetadata } from "../types";
import type { VectorEntry, VectorIndex, VectorIndexStats, VectorMatch, VectorQuery } from "./vectorIndex";

const StoredEntrySchema = z.object({
  id: z.string(),
  values: z.array(z.number()),
  metadata: z.record(z.union([z.string(), z.number(), z.boolean()])),
});

type InMemoryOptions = {
  /** When set, each namespace is mirrored to `<storageDir>/<namespace>.json`. */
  storageDir?: string;
};

export class InMemoryVectorIndex implements VectorIndex {
  readonly type = "In-Memory";
  private readonly db = new Map<string, VectorEntry[]>();
  private readonly storageDir?: string;

  constructor(options: InMemoryOptions = {}) {
    this.storageDir = options.storageDir;
    if (this.storageDir && !fs.existsSync(this.storageDir)) {
      fs.mkdirSync(this.storageDir, { recursive: true });
    }
  }

  async upsert(namespace: string, entries: VectorEntry[]): Promise<void> {
    const list = this.namespace(namespace);
    for (const e of entries) {
      const copy: VectorEntry = { id: e.id, values: [...e.values], metadata: { ...e.metadata } };
      // Replace if id exists
      const idx = list.findIndex((x) => x.id === e.id);
      if (idx >= 0) list[idx] = copy;
      else list.push(copy);
    }
    this.save(namespace);
  }

  async query({ namespace, vector, topK, filter }: VectorQuery): Promise<VectorMatch[]> {
    const list = this.namespace(namespace);
    const scored = list
      .filter((e) => !filter || matchesFilter(e.metadata, filter))
      .map((e) => ({ id: e.id, score: cosine(e.values, vector), metadata: { ...e.metadata } }));
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, topK);
  }

  async delete(namespace: string, ids: string[]): Promise<void> {
    const drop = new Set(ids);
    const list = this.namespace(namespace);
    this.db.set(
      namespace,
      list.filter((e) => !drop.has(e.id))
    );
    this.save(namespace);
  }

  async clear(namespace: string): Promise<void> {
    this.db.set(namespace, []);
    this.save(namespace);
  }

  async stats(namespace: string): Promise<VectorIndexStats> {
    return { type: this.type, namespace, count: this.namespace(namespace).length };
  }

  has(namespace: string, id: string): boolean {
    return this.namespace(namespace).some((e) => e.id === id);
  }

  private namespace(namespace: string): VectorEntry[] {
    let list = this.db.get(namespace);
    if (!list) {
      list = this.load(namespace);
      this.db.set(namespace, list);
    }
    return list;
  }

  private filePath(namespace: string): string | undefined {
    if (!this.storageDir) return undefined;
    return path.join(this.storageDir, `${encodeURIComponent(namespace)}.json`);
  }

  private load(namespace: string): VectorEntry[] {
    const filePath = this.filePath(namespace);
    if (!filePath || !fs.existsSync(filePath)) return [];
    try {
      const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      const parsed = z.array(StoredEntrySchema).safeParse(data);
      if (!parsed.success) {
        console.warn(`Ignoring malformed namespace file ${filePath}`);
        return [];
      }
      return parsed.data;
    } catch (err) {
      console.warn(`Failed to load namespace ${namespace}:`, err);
      return [];
    }
  }

  private save(namespace: string): void {
    const filePath = this.filePath(namespace);
    if (!filePath) return;
    fs.writeFileSync(filePath, JSON.stringify(this.db.get(namespace) ?? [], null, 2));
  }
}

export function cosine(a: Vector, b: Vector): number {
  const len = Math.min(a.length, b.length);
  let dot = 0,
    na = 0,
    nb = 0;
  for (let i = 0; i < len; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  const d = Math.sqrt(na) * Math.sqrt(nb) || 1;
  return dot / d;
}

export function matchesFilter(metadata: VectorMetadata, filter: VectorFilter): boolean {
  return Object.entries(filter).every(([field, condition]) => {
    const actual = metadata[field];
    if (typeof condition !== "object") return actual === condition;
    return matchesOperators(actual, condition);
  });
}

function matchesOperators(actual: MetadataValue | undefined, ops: FilterOperators): boolean {
  if (ops.$eq !== undefined && actual !== ops.$eq) return false;
  if (ops.$ne !== undefined && actual === ops.$ne) return false;
  if (ops.$in !== undefined && (actual === undefined || !ops.$in.includes(actual))) return false;
  if (ops.$nin !== undefined && actual !== undefined && ops.$nin.includes(actual)) return false;
  const ranged = ops.$gt !== undefined || ops.$gte !== undefined || ops.$lt !== undefined || ops.$lte !== undefined;
  if (!ranged) return true;
  if (typeof actual !== "number") return false;
  if (ops.$gt !== undefined && !(actual > ops.$gt)) return false;
  if (ops.$gte !== undefined && !(actual >= ops.$gte)) return false;
  if (ops.$lt !== undefined && !(actual < ops.$lt)) return false;
  if (ops.$lte !== undefined && !(actual <= ops.$lte)) return false;
  return true;
}
