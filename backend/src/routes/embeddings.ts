import { Router } from "express";
import { z } from "zod";
import { callBackend } from "../errors";
import type { ServiceContext } from "../services/context";
import { MetadataSchema, OwnerSchema } from "../validation/schemas";
import { embeddingFromBody, sendError } from "./respond";

const StoreSchema = z
  .object({
    text: z.string().min(1).optional(),
    vector: z.array(z.number()).optional(),
    table: z.string().min(1),
    namespace: z.string().min(1).optional(),
    owner: OwnerSchema,
    metadata: MetadataSchema.optional(),
  })
  .refine((b) => (b.text === undefined) !== (b.vector === undefined), {
    message: "Provide exactly one of 'text' or 'vector'",
    path: ["text"],
  });

export function createEmbeddingsRouter(ctx: ServiceContext): Router {
  const router = Router();

  router.post("/", async (req, res) => {
    try {
      const body = StoreSchema.parse(req.body);
      const embedding = await embeddingFromBody(ctx, body);
      const embeddingId = await embedding.store({
        owningTable: body.table,
        indexNamespace: body.namespace,
        owner: body.owner,
        metadata: body.metadata,
      });
      res.status(201).json({ ok: true, embeddingId, namespace: body.namespace ?? body.table });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.delete("/:namespace", async (req, res) => {
    try {
      const { namespace } = req.params;
      await callBackend("vector-index", "clear", ctx.timeoutMs, () => ctx.vectorIndex.clear(namespace));
      console.log(`Cleared vector namespace "${namespace}"`);
      res.json({ ok: true, namespace });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
