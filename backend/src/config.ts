import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  GOOGLE_API_KEY: optionalString,
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-004"),
  CHAT_MODEL: z.string().min(1).default("gemini-1.5-flash"),
  VECTOR_BACKEND: z.enum(["auto", "chroma", "memory"]).default("auto"),
  CHROMA_URL: z.string().url().default("http://localhost:8000"),
  VECTOR_STORAGE_DIR: optionalString,
  DOCUMENT_BACKEND: z.enum(["mongo", "memory"]).default("memory"),
  MONGO_URI: z.string().min(1).default("mongodb://localhost:27017"),
  MONGO_DB: z.string().min(1).default("semantic_store"),
  BACKEND_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SEARCH_CUTOFF: z.coerce.number().min(-1).max(1).default(0.4),
  SEARCH_TOP_K: z.coerce.number().int().min(1).max(1000).default(10),
});

export type AppConfig = {
  port: number;
  googleApiKey?: string;
  embeddingModel: string;
  chatModel: string;
  vectorBackend: "auto" | "chroma" | "memory";
  chromaUrl: string;
  vectorStorageDir?: string;
  documentBackend: "mongo" | "memory";
  mongoUri: string;
  mongoDb: string;
  backendTimeoutMs: number;
  search: { cutoff: number; topK: number };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const c = parsed.data;
  return Object.freeze({
    port: c.PORT,
    googleApiKey: c.GOOGLE_API_KEY,
    embeddingModel: c.EMBEDDING_MODEL,
    chatModel: c.CHAT_MODEL,
    vectorBackend: c.VECTOR_BACKEND,
    chromaUrl: c.CHROMA_URL,
    vectorStorageDir: c.VECTOR_STORAGE_DIR,
    documentBackend: c.DOCUMENT_BACKEND,
    mongoUri: c.MONGO_URI,
    mongoDb: c.MONGO_DB,
    backendTimeoutMs: c.BACKEND_TIMEOUT_MS,
    search: Object.freeze({ cutoff: c.SEARCH_CUTOFF, topK: c.SEARCH_TOP_K }),
  });
}
