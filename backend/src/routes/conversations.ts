import { Router } from "express";
import { z } from "zod";
import { AppError } from "../errors";
import type { ServiceContext } from "../services/context";
import type { Conversation, ConversationMessage } from "../services/conversation";
import { sendError } from "./respond";

const MessageSchema = z.object({
  role: z.string().min(1),
  message: z.string().min(1),
  meta: z.record(z.string(), z.unknown()).optional(),
});

const ReplySchema = z.object({
  system: z.string().min(1).optional(),
});

// a message id, or an integer index where negative counts from the end
const EndSchema = z
  .string()
  .min(1)
  .transform((v) => (/^-?\d+$/.test(v) ? Number(v) : v));

function notFound(id: string): AppError {
  return new AppError(`Conversation ${id} not found`, "NOT_FOUND", 404);
}

function messageJson(m: ConversationMessage) {
  return { id: m.id, role: m.role, message: m.message, at: m.at.toISOString(), meta: m.meta };
}

export function createConversationsRouter(ctx: ServiceContext): Router {
  const router = Router();

  const loadOr404 = async (id: string): Promise<Conversation> => {
    const conversation = await ctx.conversations.load(id);
    if (!conversation) throw notFound(id);
    return conversation;
  };

  router.post("/", async (_req, res) => {
    try {
      const conversation = await ctx.conversations.create();
      res.status(201).json({ ok: true, conversationId: conversation.id });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get("/:id", async (req, res) => {
    try {
      const { id } = req.params;
      const end = typeof req.query.end === "string" ? EndSchema.parse(req.query.end) : undefined;
      const conversation = end === undefined ? await loadOr404(id) : await ctx.conversations.loadSlice(id, end);
      if (!conversation) throw notFound(id);

      res.json({
        ok: true,
        conversationId: conversation.id,
        messages: conversation.messages.map(messageJson),
        transcript: conversation.format({ numbered: req.query.numbered === "true" }),
        totalCost: await conversation.totalCost(),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post("/:id/messages", async (req, res) => {
    try {
      const body = MessageSchema.parse(req.body);
      const conversation = await loadOr404(req.params.id);
      const saved = await conversation.say(body.role, body.message, body.meta);
      res.status(201).json({ ok: true, message: messageJson(saved) });
    } catch (err) {
      sendError(res, err);
    }
  });

  // The model answers the conversation so far; the answer is said as the assistant.
  router.post("/:id/reply", async (req, res) => {
    try {
      const { system } = ReplySchema.parse(req.body ?? {});
      const conversation = await loadOr404(req.params.id);
      const history = conversation.toChat();
      if (system) history.unshift({ role: "system", content: system });

      const answer = await ctx.llm.ask(history, { group: conversation.id });
      const saved = await conversation.say("assistant", answer, { model: ctx.llm.modelName });
      res.status(201).json({ ok: true, message: messageJson(saved), totalCost: await conversation.totalCost() });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.delete("/:id", async (req, res) => {
    try {
      const conversation = await loadOr404(req.params.id);
      await conversation.delete();
      res.json({ ok: true, conversationId: conversation.id });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
