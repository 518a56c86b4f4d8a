import { z } from "zod";

export const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const MetadataSchema = z.record(z.string(), ScalarSchema);

export const FilterSchema = z.record(
  z.string(),
  z.union([
    ScalarSchema,
    z
      .object({
        $eq: ScalarSchema.optional(),
        $ne: ScalarSchema.optional(),
        $gt: z.number().optional(),
        $gte: z.number().optional(),
        $lt: z.number().optional(),
        $lte: z.number().optional(),
        $in: z.array(ScalarSchema).optional(),
        $nin: z.array(ScalarSchema).optional(),
      })
      .strict(),
  ])
);

// exactly one of the two forms; strict objects reject a body carrying both
export const OwnerSchema = z.union([
  z.object({ id: z.string().min(1) }).strict(),
  z.object({ info: z.record(z.string(), z.unknown()) }).strict(),
]);
