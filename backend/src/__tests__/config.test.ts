import { describe, it, expect } from "vitest";
import { loadConfig } from "../config";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      googleApiKey: undefined,
      embeddingModel: "text-embedding-004",
      chatModel: "gemini-1.5-flash",
      vectorBackend: "auto",
      chromaUrl: "http://localhost:8000",
      vectorStorageDir: undefined,
      documentBackend: "memory",
      mongoUri: "mongodb://localhost:27017",
      mongoDb: "semantic_store",
      backendTimeoutMs: 10000,
      search: { cutoff: 0.4, topK: 10 },
    });
  });

  it("coerces numeric variables and treats blank keys as unset", () => {
    const config = loadConfig({ PORT: "8080", BACKEND_TIMEOUT_MS: "250", GOOGLE_API_KEY: "  ", SEARCH_CUTOFF: "0.6" });
    expect(config.port).toBe(8080);
    expect(config.backendTimeoutMs).toBe(250);
    expect(config.googleApiKey).toBeUndefined();
    expect(config.search.cutoff).toBe(0.6);
  });

  it("names the offending variable when invalid", () => {
    expect(() => loadConfig({ VECTOR_BACKEND: "pinecone" })).toThrow(/^Invalid configuration: VECTOR_BACKEND: /);
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});
