import fs from "fs";
import { z } from "zod";
import { MetadataSchema, OwnerSchema } from "../validation/schemas";
import type { ServiceContext } from "./context";

const IngestItemSchema = z.object({
  text: z.string().min(1),
  table: z.string().min(1),
  namespace: z.string().min(1).optional(),
  owner: OwnerSchema,
  metadata: MetadataSchema.optional(),
});

export type IngestItem = z.infer<typeof IngestItemSchema>;

export function readIngestFile(filePath: string): IngestItem[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Data file not found at: ${filePath}`);
  }
  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  return z.array(IngestItemSchema).parse(data);
}

export async function ingestItems(ctx: ServiceContext, items: IngestItem[]): Promise<string[]> {
  const ids: string[] = [];
  for (const item of items) {
    const embedding = await ctx.fromText(item.text);
    ids.push(
      await embedding.store({
        owningTable: item.table,
        indexNamespace: item.namespace,
        owner: item.owner,
        metadata: item.metadata,
      })
    );
    if (ids.length % 50 === 0) {
      console.log(`Stored ${ids.length}/${items.length} embeddings`);
    }
  }
  return ids;
}
