import { parse as parseYaml } from "yaml";

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export type BuiltinKindTag = "json" | "yaml" | "int" | "float" | "bool" | "list" | "text";
export type ResponseKindTag = BuiltinKindTag | "custom";

/**
 * Target shape for a model answer. Each kind owns its parser; a parser
 * reports failure as a reason the model can be shown, never by throwing.
 */
export interface ResponseKind<T> {
  readonly kind: ResponseKindTag;
  parse(raw: string): ValidationResult<T>;
}

const TRUES = ["yes", "true", "1"];
const FALSES = ["no", "false", "0"];
const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

const ok = <T>(value: T): ValidationResult<T> => ({ ok: true, value });
const fail = (reason: string): ValidationResult<never> => ({ ok: false, reason });

function unfence(text: string, lang: string): string {
  const fence = new RegExp("^```" + lang + "\\s*([\\s\\S]*?)\\s*```$");
  const m = text.match(fence);
  return m ? m[1] : text;
}

function trimChars(text: string, chars: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && chars.includes(text[start])) start++;
  while (end > start && chars.includes(text[end - 1])) end--;
  return text.slice(start, end);
}

export const responseKinds = {
  json: {
    kind: "json",
    parse(raw) {
      try {
        return ok<unknown>(JSON.parse(unfence(raw.trim(), "json")));
      } catch {
        return fail("Invalid JSON response");
      }
    },
  } satisfies ResponseKind<unknown>,

  yaml: {
    kind: "yaml",
    parse(raw) {
      try {
        return ok<unknown>(parseYaml(unfence(raw.trim(), "yaml")));
      } catch {
        return fail("Invalid YAML response");
      }
    },
  } satisfies ResponseKind<unknown>,

  int: {
    kind: "int",
    parse(raw) {
      const s = raw.trim();
      return INT_RE.test(s) ? ok(Number.parseInt(s, 10)) : fail("Invalid integer response");
    },
  } satisfies ResponseKind<number>,

  float: {
    kind: "float",
    parse(raw) {
      const s = raw.trim();
      return FLOAT_RE.test(s) ? ok(Number.parseFloat(s)) : fail("Invalid float response");
    },
  } satisfies ResponseKind<number>,

  bool: {
    kind: "bool",
    parse(raw) {
      const s = trimChars(raw.trim(), ".,!? ").toLowerCase();
      if (TRUES.includes(s)) return ok(true);
      if (FALSES.includes(s)) return ok(false);
      return fail("Invalid boolean response");
    },
  } satisfies ResponseKind<boolean>,

  list: {
    kind: "list",
    parse(raw) {
      const items = raw
        .trim()
        .split(/\n+/)
        .map((line) => trimChars(line, "+- "))
        .filter((line) => line.length > 0);
      return ok(items);
    },
  } satisfies ResponseKind<string[]>,

  text: {
    kind: "text",
    parse(raw) {
      return ok(raw.trim());
    },
  } satisfies ResponseKind<string>,

  custom<T>(validate: (raw: string) => ValidationResult<T>): ResponseKind<T> {
    return { kind: "custom", parse: validate };
  },
};

export type BuiltinResponseValue = {
  json: unknown;
  yaml: unknown;
  int: number;
  float: number;
  bool: boolean;
  list: string[];
  text: string;
};

export function builtinKind<K extends BuiltinKindTag>(tag: K): ResponseKind<BuiltinResponseValue[K]> {
  const kinds: { [P in BuiltinKindTag]: ResponseKind<BuiltinResponseValue[P]> } = responseKinds;
  return kinds[tag];
}

/** An answer of "none" stands for an absent value whatever the kind. */
export function validateResponse<T>(raw: string, kind: ResponseKind<T>): ValidationResult<T | null> {
  if (trimChars(raw.toLowerCase(), ". ") === "none") return ok(null);
  return kind.parse(raw);
}
