import type { AppConfig } from "../config";
import { ActorRegistry } from "./actors";
import { selectVectorIndex } from "./adaptiveVectorIndex";
import { Conversations } from "./conversation";
import type { DocumentStore } from "./documentStore";
import { Embedding, type EmbeddingEngines } from "./embedding";
import { EmbeddingRegistry } from "./embeddingRegistry";
import { createEmbeddingGenerator, type EmbeddingGenerator } from "./embeddings";
import { EmbeddingSearch } from "./embeddingSearch";
import { EmbeddingStore } from "./embeddingStore";
import { InMemoryDocumentStore } from "./inMemoryDocumentStore";
import { createLanguageModel, LlmClient, type LanguageModel } from "./llm";
import { MongoDocumentStore } from "./mongoDocumentStore";
import { UsageLedger } from "./usage";
import type { VectorIndex } from "./vectorIndex";

export type Backends = {
  vectorIndex: VectorIndex;
  documents: DocumentStore;
  generator: EmbeddingGenerator;
  languageModel: LanguageModel;
};

/**
 * Everything a request needs, built once at start-up and handed down
 * explicitly. Tests build one over in-process backends.
 */
export type ServiceContext = EmbeddingEngines & {
  config: AppConfig;
  vectorIndex: VectorIndex;
  documents: DocumentStore;
  registry: EmbeddingRegistry;
  llm: LlmClient;
  usage: UsageLedger;
  conversations: Conversations;
  actors: ActorRegistry;
  fromText(text: string): Promise<Embedding>;
  fromVector(vector: number[]): Embedding;
  close(): Promise<void>;
};

export function buildServiceContext(
  config: AppConfig,
  backends: Backends,
  close: () => Promise<void> = async () => {}
): ServiceContext {
  const { vectorIndex, documents, generator, languageModel } = backends;
  const timeoutMs = config.backendTimeoutMs;
  const registry = new EmbeddingRegistry(documents);
  const engineBackends = { vectorIndex, documents, registry, timeoutMs };
  const engines: EmbeddingEngines = {
    generator,
    timeoutMs,
    store: new EmbeddingStore(engineBackends),
    search: new EmbeddingSearch(engineBackends, config.search),
  };

  const usage = new UsageLedger(documents, timeoutMs);

  return {
    ...engines,
    config,
    vectorIndex,
    documents,
    registry,
    llm: new LlmClient(languageModel, timeoutMs, usage),
    usage,
    conversations: new Conversations(documents, timeoutMs, usage),
    actors: new ActorRegistry(documents, timeoutMs),
    fromText: (text) => Embedding.fromText(engines, text),
    fromVector: (vector) => Embedding.fromVector(engines, vector),
    close,
  };
}

export async function createServiceContext(config: AppConfig): Promise<ServiceContext> {
  const vectorIndex = await selectVectorIndex(config);

  let documents: DocumentStore;
  let close = async () => {};
  if (config.documentBackend === "mongo") {
    const mongo = new MongoDocumentStore(config.mongoUri, config.mongoDb);
    await mongo.connect();
    console.log(`Connected to MongoDB database "${config.mongoDb}"`);
    documents = mongo;
    close = () => mongo.close();
  } else {
    console.warn("Using in-memory document store - documents are lost on restart");
    documents = new InMemoryDocumentStore();
  }

  return buildServiceContext(
    config,
    {
      vectorIndex,
      documents,
      generator: createEmbeddingGenerator(config),
      languageModel: createLanguageModel(config),
    },
    close
  );
}
