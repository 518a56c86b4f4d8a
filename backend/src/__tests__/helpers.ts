import { loadConfig, type AppConfig } from "../config";
import { buildServiceContext, type ServiceContext } from "../services/context";
import { FauxEmbeddingGenerator } from "../services/embeddings";
import { InMemoryDocumentStore } from "../services/inMemoryDocumentStore";
import { InMemoryVectorIndex } from "../services/inMemoryVectorIndex";
import type { ChatMessage, Completion, LanguageModel } from "../services/llm";
import type { TokenUsage } from "../services/usage";

/** W1, W2… for `widgets`, E1, E2… for the registry, `<ns>-1` elsewhere. */
export function sequentialIds(prefixes: Record<string, string> = { widgets: "W", embeddings: "E" }) {
  const counters = new Map<string, number>();
  return (namespace: string): string => {
    const n = (counters.get(namespace) ?? 0) + 1;
    counters.set(namespace, n);
    return `${prefixes[namespace] ?? `${namespace}-`}${n}`;
  };
}

export class ScriptedModel implements LanguageModel {
  readonly name = "scripted";
  readonly calls: ChatMessage[][] = [];

  constructor(
    private readonly answers: string[],
    private readonly usage: TokenUsage = { promptTokens: 0, completionTokens: 0 },
    readonly model = "scripted"
  ) {}

  async complete(messages: ChatMessage[]): Promise<Completion> {
    this.calls.push(messages.map((m) => ({ ...m })));
    const answer = this.answers[this.calls.length - 1];
    if (answer === undefined) throw new Error("no scripted answer left");
    return { content: answer, usage: this.usage };
  }
}

export type TestContext = ServiceContext & {
  index: InMemoryVectorIndex;
  docs: InMemoryDocumentStore;
};

export function testContext(
  options: { env?: NodeJS.ProcessEnv; model?: LanguageModel } = {}
): TestContext {
  const config: AppConfig = loadConfig(options.env ?? {});
  const index = new InMemoryVectorIndex();
  const docs = new InMemoryDocumentStore({ generateId: sequentialIds() });
  const ctx = buildServiceContext(config, {
    vectorIndex: index,
    documents: docs,
    generator: new FauxEmbeddingGenerator(),
    languageModel: options.model ?? new ScriptedModel([]),
  });
  return { ...ctx, index, docs };
}
