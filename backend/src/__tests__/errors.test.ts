import { describe, it, expect } from "vitest";
import { BackendTimeout, BackendUnavailable, callBackend, InvalidQuery } from "../errors";

describe("callBackend", () => {
  it("returns the call's result", async () => {
    await expect(callBackend("vector-index", "query", 1000, async () => 7)).resolves.toBe(7);
  });

  it("wraps failures with backend, operation and cause", async () => {
    const cause = new Error("ECONNREFUSED");
    const error = await callBackend("document-store", "findOne", 1000, async () => {
      throw cause;
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BackendUnavailable);
    expect(error).toMatchObject({
      message: "document-store findOne failed: ECONNREFUSED",
      backend: "document-store",
      operation: "findOne",
      statusCode: 502,
      cause,
    });
  });

  it("turns a missed deadline into BackendUnavailable", async () => {
    const error = await callBackend("vector-index", "query", 20, () => new Promise<never>(() => {})).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(BackendUnavailable);
    expect(error).toMatchObject({ message: "vector-index query failed: timed out after 20ms" });
    expect(error instanceof BackendUnavailable && error.cause).toBeInstanceOf(BackendTimeout);
  });

  it("does not wrap application errors", async () => {
    const inner = new InvalidQuery();
    await expect(
      callBackend("vector-index", "query", 1000, async () => {
        throw inner;
      })
    ).rejects.toBe(inner);
  });
});
