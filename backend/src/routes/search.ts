import { Router } from "express";
import { z } from "zod";
import type { ServiceContext } from "../services/context";
import { FilterSchema } from "../validation/schemas";
import { embeddingFromBody, sendError } from "./respond";

const SearchSchema = z.object({
  text: z.string().optional(),
  vector: z.array(z.number()).optional(),
  namespace: z.string().min(1),
  k: z.number().int().min(1).max(100).optional(),
  cutoff: z.number().min(-1).max(1).optional(),
  filter: FilterSchema.optional(),
});

export function createSearchRouter(ctx: ServiceContext): Router {
  const router = Router();

  router.post("/", async (req, res) => {
    try {
      const { namespace, k, cutoff, filter, ...query } = SearchSchema.parse(req.body);
      const embedding = await embeddingFromBody(ctx, query);
      const report = await embedding.searchDetailed(namespace, { k, cutoff, filter });
      res.json({
        ok: true,
        results: report.hits.map((h) => ({ score: h.score, embeddingId: h.embeddingId, document: h.document })),
        repaired: report.lostIds.length,
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
