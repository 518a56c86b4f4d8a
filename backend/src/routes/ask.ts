import { Router } from "express";
import { z } from "zod";
import type { ServiceContext } from "../services/context";
import { builtinKind } from "../validation/responseValidator";
import { sendError } from "./respond";

const AskSchema = z.object({
  prompt: z.string().min(1),
  system: z.string().min(1).optional(),
  kind: z.enum(["json", "yaml", "int", "float", "bool", "list", "text"]).optional().default("text"),
  attempts: z.number().int().min(1).max(5).optional().default(3),
  // usage of the call is charged to this conversation
  conversationId: z.string().min(1).optional(),
});

export function createAskRouter(ctx: ServiceContext): Router {
  const router = Router();

  router.post("/", async (req, res) => {
    try {
      const { prompt, system, kind, attempts, conversationId } = AskSchema.parse(req.body);
      const messages = system
        ? [{ role: "system" as const, content: system }, { role: "user" as const, content: prompt }]
        : prompt;
      const value = await ctx.llm.askValid(messages, builtinKind(kind), { attempts, group: conversationId });
      res.json({ ok: true, kind, value, model: ctx.llm.modelName });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
