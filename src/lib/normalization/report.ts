import { mean, numericValuesOf, sampleStd } from "../table/stats";
import { requireColumns } from "../table/table";
import type { Table } from "../table/types";

export type NormalizationReportRow = {
  column: string;
  meanBefore: number | null;
  stdBefore: number | null;
  meanAfter: number | null;
  stdAfter: number | null;
};

export const buildNormalizationReport = (
  before: Table,
  after: Table,
  columns: readonly string[]
): NormalizationReportRow[] => {
  requireColumns(before, columns, "buildNormalizationReport (before)");
  requireColumns(after, columns, "buildNormalizationReport (after)");
  return columns.map((name) => {
    const source = before.columns.get(name);
    const target = after.columns.get(name);
    const beforeValues = source ? numericValuesOf(source) : [];
    const afterValues = target ? numericValuesOf(target) : [];
    return {
      column: name,
      meanBefore: mean(beforeValues),
      stdBefore: sampleStd(beforeValues),
      meanAfter: mean(afterValues),
      stdAfter: sampleStd(afterValues)
    };
  });
};
