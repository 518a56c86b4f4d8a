import { describe, it, expect } from "vitest";
import { InMemoryDocumentStore } from "../services/inMemoryDocumentStore";
import { costOf, UsageLedger } from "../services/usage";
import { sequentialIds } from "./helpers";

describe("costOf", () => {
  it("prices prompt and completion tokens per million", () => {
    expect(costOf("gemini-1.5-flash", { promptTokens: 1000, completionTokens: 200 })).toBeCloseTo(0.000135, 12);
    expect(costOf("gemini-1.5-pro", { promptTokens: 0, completionTokens: 1_000_000 })).toBeCloseTo(5, 10);
  });

  it("charges nothing for a model without a price", () => {
    expect(costOf("echo", { promptTokens: 500, completionTokens: 500 })).toBe(0);
  });
});

describe("UsageLedger", () => {
  it("records one document per call and totals them by group", async () => {
    const docs = new InMemoryDocumentStore({ generateId: sequentialIds() });
    const ledger = new UsageLedger(docs, 1000);

    const first = await ledger.record("gemini-1.5-flash", { promptTokens: 1_000_000, completionTokens: 0 }, "c1");
    await ledger.record("gemini-1.5-pro", { promptTokens: 0, completionTokens: 1_000_000 }, "c1");
    await ledger.record("gemini-1.5-flash", { promptTokens: 1_000_000, completionTokens: 1_000_000 }, "c2");
    await ledger.record("echo", { promptTokens: 3, completionTokens: 4 });

    expect(first).toMatchObject({ model: "gemini-1.5-flash", promptTokens: 1_000_000, completionTokens: 0, group: "c1" });
    expect(first.cost).toBeCloseTo(0.075, 10);
    expect(docs.count("llm_calls")).toBe(4);
    expect(await docs.findOne("llm_calls", { model: "echo" })).toEqual({
      _id: "llm_calls-4",
      model: "echo",
      promptTokens: 3,
      completionTokens: 4,
      cost: 0,
      group: null,
    });

    expect(await ledger.totalCost("c1")).toBeCloseTo(5.075, 10);
    expect(await ledger.totalCost("c2")).toBeCloseTo(0.375, 10);
    expect(await ledger.totalCost("c3")).toBe(0);
  });
});
