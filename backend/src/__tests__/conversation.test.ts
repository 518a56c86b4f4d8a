import { describe, it, expect, beforeEach } from "vitest";
import { AppError } from "../errors";
import type { Conversation } from "../services/conversation";
import { ScriptedModel, testContext, type TestContext } from "./helpers";

describe("Conversations", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = testContext();
  });

  const withMessages = async (...lines: Array<[string, string]>): Promise<Conversation> => {
    const convo = await ctx.conversations.create();
    for (const [role, message] of lines) await convo.say(role, message);
    return convo;
  };

  it("persists messages and loads them back in order", async () => {
    const convo = await ctx.conversations.create();
    expect(convo.id).toBe("convos-1");

    const first = await convo.say("user", "hi");
    await convo.say("assistant", "hello", { model: "m" });
    expect(first).toMatchObject({ id: "messages-1", conversationId: "convos-1", role: "user", meta: {} });

    const loaded = await ctx.conversations.load("convos-1");
    expect(loaded?.messages.map((m) => [m.id, m.role, m.message, m.meta])).toEqual([
      ["messages-1", "user", "hi", {}],
      ["messages-2", "assistant", "hello", { model: "m" }],
    ]);
    expect(await ctx.docs.findOne("convos", { _id: "convos-1" })).toEqual({ _id: "convos-1", finished: false });
  });

  it("returns null for an unknown conversation", async () => {
    expect(await ctx.conversations.load("convos-9")).toBeNull();
  });

  it("formats the history with the most recent message apart", async () => {
    const empty = await ctx.conversations.create();
    expect(empty.format()).toBe("(no conversation yet)");

    const one = await withMessages(["user", "hi"]);
    expect(one.format()).toBe("(start of conversation)\n\nMost Recent Message:\nuser: hi");

    const three = await withMessages(["user", "a"], ["assistant", "b"], ["user", "c"]);
    expect(three.format({ numbered: true })).toBe("1 = user: a\n2 = assistant: b\n\nMost Recent Message:\n3 = user: c");
    expect(three.format({ start: 1 })).toBe("assistant: b\n\nMost Recent Message:\nuser: c");
    expect(three.format({ end: 1 })).toBe("(start of conversation)\n\nMost Recent Message:\nuser: a");
  });

  it("loads a slice ending at an index or a message id", async () => {
    const convo = await withMessages(["user", "a"], ["assistant", "b"], ["user", "c"]);
    const texts = (c: Conversation | null) => c?.messages.map((m) => m.message);

    expect(texts(await ctx.conversations.loadSlice(convo.id, 2))).toEqual(["a", "b"]);
    expect(texts(await ctx.conversations.loadSlice(convo.id, -1))).toEqual(["a", "b"]);
    expect(texts(await ctx.conversations.loadSlice(convo.id, "messages-1"))).toEqual(["a"]);

    const error = await ctx.conversations.loadSlice(convo.id, "messages-7").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ code: "MESSAGE_NOT_FOUND", statusCode: 404 });
  });

  it("reads and writes conversation attributes", async () => {
    const convo = await ctx.conversations.create();
    await convo.set("finished", true);
    await convo.set("topic", "widgets");

    expect(await convo.get("finished")).toBe(true);
    expect(await convo.get("topic")).toBe("widgets");
    expect(await convo.get("missing")).toBeUndefined();
  });

  it("deletes the conversation with its messages", async () => {
    const keep = await withMessages(["user", "keep me"]);
    const convo = await withMessages(["user", "a"], ["assistant", "b"]);
    await convo.delete();

    expect(await ctx.conversations.load(convo.id)).toBeNull();
    expect(ctx.docs.count("messages")).toBe(1);
    expect((await ctx.conversations.load(keep.id))?.messages).toHaveLength(1);
  });

  it("speaks unknown roles to the model as the user", async () => {
    const convo = await withMessages(["system", "be brief"], ["Support Agent", "how can I help?"], ["user", "hi"]);
    expect(convo.toChat()).toEqual([
      { role: "system", content: "be brief" },
      { role: "user", content: "Support Agent: how can I help?" },
      { role: "user", content: "hi" },
    ]);
  });

  it("totals the cost of model calls made for the conversation", async () => {
    const model = new ScriptedModel(["sure", "done"], { promptTokens: 1_000_000, completionTokens: 1_000_000 }, "gemini-1.5-flash");
    ctx = testContext({ model });
    const convo = await withMessages(["user", "hi"]);
    const other = await ctx.conversations.create();

    await ctx.llm.ask(convo.toChat(), { group: convo.id });
    await ctx.llm.ask("unrelated", { group: other.id });

    expect(await convo.totalCost()).toBeCloseTo(0.375, 10);
    expect(await other.totalCost()).toBeCloseTo(0.375, 10);
    expect(await (await ctx.conversations.create()).totalCost()).toBe(0);
  });
});
