import { z } from "zod";
import { columnListSchema } from "../config";

export const missingStrategySchema = z.enum([
  "drop_rows",
  "drop_cols",
  "constant",
  "mean",
  "median",
  "mode",
  "group_median",
  "group_mode",
  "ffill",
  "bfill",
  "interpolate_linear"
]);

export type MissingStrategy = z.infer<typeof missingStrategySchema>;

export const GROUP_STRATEGIES: ReadonlySet<MissingStrategy> = new Set(["group_median", "group_mode"]);

// strategies that cannot run without a declared ordering column
export const ORDERED_STRATEGIES: ReadonlySet<MissingStrategy> = new Set(["ffill", "bfill"]);

export const missingPolicySchema = z
  .object({
    strategy: missingStrategySchema.default("median"),
    columns: columnListSchema.optional(),
    constantValue: z.union([z.number(), z.string(), z.boolean(), z.date()]).default(0),
    dropThresholdPct: z.number().min(0).max(100).default(60),
    groupByColumn: z.string().min(1).optional(),
    timeColumn: z.string().min(1).optional(),
    sortTime: z.boolean().default(true)
  })
  .strict()
  .superRefine((policy, ctx) => {
    if (GROUP_STRATEGIES.has(policy.strategy) && policy.groupByColumn === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["groupByColumn"],
        message: `groupByColumn is required for strategy "${policy.strategy}".`
      });
    }
    if (ORDERED_STRATEGIES.has(policy.strategy) && policy.timeColumn === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["timeColumn"],
        message: `timeColumn is required for strategy "${policy.strategy}".`
      });
    }
  });

export type MissingPolicyInput = z.input<typeof missingPolicySchema>;
export type MissingPolicy = z.output<typeof missingPolicySchema>;
