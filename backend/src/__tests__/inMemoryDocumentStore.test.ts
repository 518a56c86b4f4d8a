import { describe, it, expect } from "vitest";
import { InMemoryDocumentStore } from "../services/inMemoryDocumentStore";
import { sequentialIds } from "./helpers";

describe("InMemoryDocumentStore", () => {
  it("matches documents on every queried field", async () => {
    const store = new InMemoryDocumentStore({ generateId: sequentialIds() });
    await store.insertOne("widgets", { name: "gear", size: 3, tags: ["brass"] });
    await store.insertOne("widgets", { name: "gear", size: 4 });

    expect(await store.findOne("widgets", { name: "gear", size: 4 })).toEqual({ _id: "W2", name: "gear", size: 4 });
    expect(await store.findOne("widgets", { tags: ["brass"] })).toEqual({
      _id: "W1",
      name: "gear",
      size: 3,
      tags: ["brass"],
    });
    expect(await store.findOne("widgets", { name: "hinge" })).toBeNull();
  });

  it("returns copies that do not alias stored documents", async () => {
    const store = new InMemoryDocumentStore({ generateId: sequentialIds() });
    const info = { name: "gear" };
    await store.insertOne("widgets", info);
    info.name = "changed";

    const found = await store.findOne("widgets", { _id: "W1" });
    expect(found?.name).toBe("gear");
  });

  it("keeps a caller-supplied string id", async () => {
    const store = new InMemoryDocumentStore();
    expect(await store.insertOne("notes", { _id: "D1", title: "x" })).toBe("D1");
    expect(await store.findOne("notes", { _id: "D1" })).toEqual({ _id: "D1", title: "x" });
  });

  it("keeps a caller-supplied numeric id as its string form", async () => {
    const store = new InMemoryDocumentStore({ generateId: sequentialIds() });
    expect(await store.insertOne("widgets", { _id: 5, name: "x" })).toBe("5");
    expect(await store.findOne("widgets", { _id: 5, name: "x" })).toEqual({ _id: "5", name: "x" });
    expect(await store.findOne("widgets", { _id: "5" })).toEqual({ _id: "5", name: "x" });
  });

  it("finds every match in insertion order", async () => {
    const store = new InMemoryDocumentStore({ generateId: sequentialIds() });
    await store.insertOne("messages", { convo: "c1", text: "a" });
    await store.insertOne("messages", { convo: "c2", text: "b" });
    await store.insertOne("messages", { convo: "c1", text: "c" });

    expect(await store.find("messages", { convo: "c1" })).toEqual([
      { _id: "messages-1", convo: "c1", text: "a" },
      { _id: "messages-3", convo: "c1", text: "c" },
    ]);
  });

  it("updates the first match without touching its id", async () => {
    const store = new InMemoryDocumentStore({ generateId: sequentialIds() });
    await store.insertOne("widgets", { name: "gear" });

    expect(await store.updateOne("widgets", { _id: "W1" }, { _id: "X", size: 4 })).toBe(true);
    expect(await store.updateOne("widgets", { _id: "W2" }, { size: 5 })).toBe(false);
    expect(await store.findOne("widgets", { name: "gear" })).toEqual({ _id: "W1", name: "gear", size: 4 });
  });

  it("deletes every match and reports the count", async () => {
    const store = new InMemoryDocumentStore({ generateId: sequentialIds() });
    await store.insertOne("widgets", { kind: "a" });
    await store.insertOne("widgets", { kind: "a" });
    await store.insertOne("widgets", { kind: "b" });

    expect(await store.deleteMany("widgets", { kind: "a" })).toBe(2);
    expect(store.count("widgets")).toBe(1);
  });
});
