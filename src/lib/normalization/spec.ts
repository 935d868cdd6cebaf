import { z } from "zod";
import { columnListSchema } from "../config";

export const normalizationMethodSchema = z.enum(["standard", "minmax", "robust", "log", "yeo_johnson"]);

export type NormalizationMethod = z.infer<typeof normalizationMethodSchema>;

export const normalizationSpecSchema = z
  .object({
    method: normalizationMethodSchema.default("standard"),
    columns: columnListSchema.optional(),
    clip: z.boolean().default(false),
    clipRange: z.tuple([z.number(), z.number()]).default([-5, 5])
  })
  .strict()
  .refine((spec) => spec.clipRange[0] < spec.clipRange[1], {
    message: "clipRange must be [low, high] with low < high.",
    path: ["clipRange"]
  });

export type NormalizationSpecInput = z.input<typeof normalizationSpecSchema>;
export type NormalizationSpec = z.output<typeof normalizationSpecSchema>;
