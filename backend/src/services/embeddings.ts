import { GoogleGenerativeAI } from "@google/generative-ai";
import type { AppConfig } from "../config";
import type { Vector } from "../types";

export interface EmbeddingGenerator {
  readonly name: string;
  embed(text: string): Promise<Vector>;
  embedMany(texts: string[]): Promise<Vector[]>;
}

export const FAUX_DIMENSIONS = 256;

export class GeminiEmbeddingGenerator implements EmbeddingGenerator {
  readonly name: string;
  private client: GoogleGenerativeAI | null = null;

  constructor(private readonly apiKey: string, private readonly model: string) {
    this.name = `gemini:${model}`;
  }

  // Lazy init client
  private getClient(): GoogleGenerativeAI {
    if (!this.client) this.client = new GoogleGenerativeAI(this.apiKey);
    return this.client;
  }

  async embed(text: string): Promise<Vector> {
    const model = this.getClient().getGenerativeModel({ model: this.model });
    const res = await model.embedContent(text);
    const values = res.embedding?.values;
    if (!values || values.length === 0) throw new Error("Embedding response missing values");
    return values;
  }

  async embedMany(texts: string[]): Promise<Vector[]> {
    const vectors: Vector[] = [];
    for (const text of texts) {
      vectors.push(await this.embed(text));
    }
    return vectors;
  }
}

/**
 * Deterministic hashing embedding used when no API key is configured.
 * Not semantic: only identical token streams land close together.
 */
export class FauxEmbeddingGenerator implements EmbeddingGenerator {
  readonly name = "faux-hash";

  constructor(private readonly dim: number = FAUX_DIMENSIONS) {}

  async embed(text: string): Promise<Vector> {
    return fauxEmbed(text, this.dim);
  }

  async embedMany(texts: string[]): Promise<Vector[]> {
    return texts.map((t) => fauxEmbed(t, this.dim));
  }
}

export function fauxEmbed(text: string, dim: number = FAUX_DIMENSIONS): Vector {
  const v: number[] = new Array(dim).fill(0);
  let h = 2166136261 >>> 0;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 16777619) >>> 0;
    v[h % dim] += 1;
  }
  // L2 normalize
  const norm = Math.sqrt(v.reduce((a, b) => a + b * b, 0)) || 1;
  return v.map((x) => x / norm);
}

export function createEmbeddingGenerator(config: AppConfig): EmbeddingGenerator {
  if (!config.googleApiKey) {
    console.warn("GOOGLE_API_KEY not set - using hashing embeddings (not semantic)");
    return new FauxEmbeddingGenerator();
  }
  return new GeminiEmbeddingGenerator(config.googleApiKey, config.embeddingModel);
}
