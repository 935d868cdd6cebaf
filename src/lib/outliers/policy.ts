import { z } from "zod";
import { columnListSchema } from "../config";

export const outlierMethodSchema = z.enum(["iqr", "mad", "pct"]);
export const outlierActionSchema = z.enum(["cap", "flag", "drop"]);

export type OutlierMethod = z.infer<typeof outlierMethodSchema>;
export type OutlierAction = z.infer<typeof outlierActionSchema>;

const probability = z.number().min(0).max(1);

export const outlierPolicySchema = z
  .object({
    method: outlierMethodSchema.default("iqr"),
    action: outlierActionSchema.default("cap"),
    iqrK: z.number().positive().default(1.5),
    madZ: z.number().positive().default(3.5),
    capLowerQ: probability.default(0.01),
    capUpperQ: probability.default(0.99),
    minNonNull: z.number().int().min(0).default(30),
    flagSuffix: z.string().min(1).default("__is_outlier"),
    columns: columnListSchema.optional()
  })
  .strict()
  .refine((policy) => policy.capLowerQ < policy.capUpperQ, {
    message: "capLowerQ must be lower than capUpperQ.",
    path: ["capLowerQ"]
  });

export type OutlierPolicyInput = z.input<typeof outlierPolicySchema>;
export type OutlierPolicy = z.output<typeof outlierPolicySchema>;
