import express from "express";
import cors from "cors";
import { AppError, callBackend } from "./errors";
import type { ServiceContext } from "./services/context";
import { createEmbeddingsRouter } from "./routes/embeddings";
import { createSearchRouter } from "./routes/search";
import { createAskRouter } from "./routes/ask";
import { createConversationsRouter } from "./routes/conversations";

export function createApp(ctx: ServiceContext) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "10mb" }));

  app.get("/health", async (req, res) => {
    try {
      const namespace = typeof req.query.namespace === "string" ? req.query.namespace : undefined;
      const stats = namespace
        ? await callBackend("vector-index", "stats", ctx.timeoutMs, () => ctx.vectorIndex.stats(namespace))
        : undefined;
      res.json({
        status: "ok",
        timestamp: new Date().toISOString(),
        storage: {
          vectorIndex: ctx.vectorIndex.type,
          documentStore: ctx.documents.type,
          ...(stats ? { namespace: stats.namespace, vectors: stats.count } : {}),
        },
        embeddings: ctx.generator.name,
      });
    } catch (error) {
      res.status(error instanceof AppError ? error.statusCode : 500).json({
        status: "error",
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      });
    }
  });

  app.use("/embeddings", createEmbeddingsRouter(ctx));
  app.use("/search", createSearchRouter(ctx));
  app.use("/ask", createAskRouter(ctx));
  app.use("/conversations", createConversationsRouter(ctx));

  return app;
}
