import type { Response } from "express";
import { ZodError } from "zod";
import { AppError, InvalidQuery } from "../errors";
import type { Embedding } from "../services/embedding";
import type { ServiceContext } from "../services/context";

/** Either raw text (normalized and embedded here) or a precomputed vector. */
export async function embeddingFromBody(
  ctx: ServiceContext,
  body: { text?: string; vector?: number[] }
): Promise<Embedding> {
  if (body.vector !== undefined) return ctx.fromVector(body.vector);
  // blank text carries no query, same as no text at all
  if (body.text !== undefined && body.text.trim() !== "") return ctx.fromText(body.text);
  throw new InvalidQuery("Provide either 'text' or 'vector'");
}

export function sendError(res: Response, err: unknown): void {
  if (err instanceof ZodError) {
    const error = err.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
    res.status(400).json({ ok: false, code: "VALIDATION_ERROR", error });
    return;
  }
  if (err instanceof AppError) {
    if (err.statusCode >= 500) console.error(err);
    res.status(err.statusCode).json({ ok: false, code: err.code, error: err.message });
    return;
  }
  console.error(err);
  res.status(500).json({ ok: false, code: "INTERNAL_ERROR", error: err instanceof Error ? err.message : "Request failed" });
}
