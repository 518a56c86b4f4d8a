import path from "path";
import dotenv from "dotenv";
import { loadConfig } from "../config";
import { createServiceContext } from "../services/context";
import { ingestItems, readIngestFile } from "../services/ingest";

const DEFAULT_DATA_PATH = path.join(process.cwd(), "backend", "data", "widgets.json");

async function ingestFile(filePath: string) {
  console.log(`Reading items from ${filePath}`);
  const items = readIngestFile(filePath);
  const ctx = await createServiceContext(loadConfig());
  try {
    const ids = await ingestItems(ctx, items);
    console.log(`Stored ${ids.length} embeddings (${ctx.vectorIndex.type} / ${ctx.documents.type})`);
  } finally {
    await ctx.close();
  }
}

// Run if called directly
if (require.main === module) {
  dotenv.config();
  ingestFile(path.resolve(process.argv[2] ?? DEFAULT_DATA_PATH)).catch((error: unknown) => {
    console.error("Ingest failed:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
