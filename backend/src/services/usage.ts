import { z } from "zod";
import { callBackend } from "../errors";
import type { DocumentStore } from "./documentStore";

export const USAGE_NAMESPACE = "llm_calls";

export type TokenUsage = {
  promptTokens: number;
  completionTokens: number;
};

export type UsageRecord = TokenUsage & {
  model: string;
  /** Dollars. Zero for models without a known price. */
  cost: number;
  group: string | null;
};

// USD per 1M tokens, input then output
const PRICING: Record<string, [number, number]> = {
  "gemini-1.5-flash": [0.075, 0.3],
  "gemini-1.5-flash-8b": [0.0375, 0.15],
  "gemini-1.5-pro": [1.25, 5],
  "gemini-2.0-flash": [0.1, 0.4],
};

export function costOf(model: string, usage: TokenUsage): number {
  const price = PRICING[model];
  if (!price) return 0;
  return (price[0] * usage.promptTokens + price[1] * usage.completionTokens) / 1e6;
}

const StoredUsageSchema = z.object({ cost: z.number() });

/**
 * One document per model call, grouped by whatever the caller is working on
 * (usually a conversation id).
 */
export class UsageLedger {
  constructor(
    private readonly documents: DocumentStore,
    private readonly timeoutMs: number,
    readonly namespace: string = USAGE_NAMESPACE
  ) {}

  async record(model: string, usage: TokenUsage, group: string | null = null): Promise<UsageRecord> {
    const record: UsageRecord = { ...usage, model, cost: costOf(model, usage), group };
    await callBackend("document-store", "usage.record", this.timeoutMs, () =>
      this.documents.insertOne(this.namespace, { ...record })
    );
    return record;
  }

  async totalCost(group: string): Promise<number> {
    const calls = await callBackend("document-store", "usage.find", this.timeoutMs, () =>
      this.documents.find(this.namespace, { group })
    );
    return calls.reduce((sum, call) => {
      const parsed = StoredUsageSchema.safeParse(call);
      return parsed.success ? sum + parsed.data.cost : sum;
    }, 0);
  }
}
