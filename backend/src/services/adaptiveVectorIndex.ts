import type { AppConfig } from "../config";
import { ChromaVectorIndex } from "./chromaVectorIndex";
import { InMemoryVectorIndex } from "./inMemoryVectorIndex";
import type { VectorIndex } from "./vectorIndex";

/**
 * Chooses the vector backend once at start-up. With `auto`, Chroma is used
 * when its heartbeat answers, otherwise the in-memory index. Failures after
 * start-up are never answered by switching backends: entries written to one
 * index would be invisible to the other.
 */
export async function selectVectorIndex(config: AppConfig): Promise<VectorIndex> {
  const inMemory = () => new InMemoryVectorIndex({ storageDir: config.vectorStorageDir });

  if (config.vectorBackend === "memory") return inMemory();

  const chroma = new ChromaVectorIndex(config.chromaUrl);
  if (config.vectorBackend === "chroma") return chroma;

  console.log("Testing ChromaDB connection...");
  if (await chroma.healthCheck()) {
    console.log(`ChromaDB is available at ${config.chromaUrl} - using persistent storage`);
    return chroma;
  }
  console.log("ChromaDB not available - falling back to in-memory storage");
  return inMemory();
}
