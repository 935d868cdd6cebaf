import { z } from "zod";
import { columnListSchema } from "../config";

const TARGET_LISTS = [
  "numericColumns",
  "datetimeColumns",
  "booleanColumns",
  "categoricalColumns"
] as const;

export const typeFixSpecSchema = z
  .object({
    numericColumns: columnListSchema.default([]),
    datetimeColumns: columnListSchema.default([]),
    booleanColumns: columnListSchema.default([]),
    categoricalColumns: columnListSchema.default([]),
    dayFirst: z.boolean().default(false),
    categoryMinFreq: z.number().int().min(1).default(1),
    otherLabel: z.string().min(1).default("Other"),
    normalizeColumnNames: z.boolean().default(false)
  })
  .strict()
  .superRefine((spec, ctx) => {
    const owner = new Map<string, string>();
    TARGET_LISTS.forEach((list) => {
      spec[list].forEach((column) => {
        const previous = owner.get(column);
        if (previous !== undefined && previous !== list) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [list],
            message: `Column "${column}" is also listed in ${previous}.`
          });
        }
        owner.set(column, list);
      });
    });
  });

export type TypeFixSpecInput = z.input<typeof typeFixSpecSchema>;
export type TypeFixSpec = z.output<typeof typeFixSpecSchema>;
