import { describe, it, expect } from "vitest";
import { builtinKind, responseKinds, validateResponse, type ValidationResult } from "../validation/responseValidator";

describe("validateResponse", () => {
  it("reads 'none' as an absent value for any kind", () => {
    expect(validateResponse("None.", responseKinds.int)).toEqual({ ok: true, value: null });
    expect(validateResponse(" none ", responseKinds.json)).toEqual({ ok: true, value: null });
  });

  it("parses JSON, with or without a code fence", () => {
    expect(validateResponse('{"a": 1}', responseKinds.json)).toEqual({ ok: true, value: { a: 1 } });
    expect(validateResponse('```json\n{"a": [1, 2]}\n```', responseKinds.json)).toEqual({
      ok: true,
      value: { a: [1, 2] },
    });
    expect(validateResponse("{a:", responseKinds.json)).toEqual({ ok: false, reason: "Invalid JSON response" });
  });

  it("parses YAML inside a fence", () => {
    expect(validateResponse("```yaml\nname: gear\ncount: 2\n```", responseKinds.yaml)).toEqual({
      ok: true,
      value: { name: "gear", count: 2 },
    });
  });

  it("accepts only whole integers for int", () => {
    expect(validateResponse(" 42 ", responseKinds.int)).toEqual({ ok: true, value: 42 });
    expect(validateResponse("-7", responseKinds.int)).toEqual({ ok: true, value: -7 });
    expect(validateResponse("4.5", responseKinds.int)).toEqual({ ok: false, reason: "Invalid integer response" });
  });

  it("parses decimal and exponent floats", () => {
    expect(validateResponse("3.25", responseKinds.float)).toEqual({ ok: true, value: 3.25 });
    expect(validateResponse("1e3", responseKinds.float)).toEqual({ ok: true, value: 1000 });
    expect(validateResponse("0x10", responseKinds.float)).toEqual({ ok: false, reason: "Invalid float response" });
  });

  it("maps yes/no style answers to booleans", () => {
    expect(validateResponse("Yes!", responseKinds.bool)).toEqual({ ok: true, value: true });
    expect(validateResponse("false.", responseKinds.bool)).toEqual({ ok: true, value: false });
    expect(validateResponse("0", responseKinds.bool)).toEqual({ ok: true, value: false });
    expect(validateResponse("maybe", responseKinds.bool)).toEqual({ ok: false, reason: "Invalid boolean response" });
  });

  it("splits lists on lines and strips bullets", () => {
    expect(validateResponse("- apples\n- pears\n\n+ plums\n", responseKinds.list)).toEqual({
      ok: true,
      value: ["apples", "pears", "plums"],
    });
  });

  it("trims text", () => {
    expect(validateResponse("  a gear  ", responseKinds.text)).toEqual({ ok: true, value: "a gear" });
  });

  it("runs a custom predicate and keeps its failure reason", () => {
    const even = responseKinds.custom((raw): ValidationResult<number> => {
      const n = Number(raw.trim());
      return Number.isInteger(n) && n % 2 === 0 ? { ok: true, value: n } : { ok: false, reason: "Expected an even number" };
    });

    expect(even.kind).toBe("custom");
    expect(validateResponse("8", even)).toEqual({ ok: true, value: 8 });
    expect(validateResponse("7", even)).toEqual({ ok: false, reason: "Expected an even number" });
  });

  it("looks up built-in kinds by tag", () => {
    expect(builtinKind("int")).toBe(responseKinds.int);
    expect(builtinKind("list").kind).toBe("list");
  });
});
