import { cellsOf } from "../table/table";
import type { CellValue, Column } from "../table/types";

export type CoercionResult<C extends Column> = {
  column: C;
  attempted: number;
  failed: number;
  failRate: number;
};

export const toToken = (value: CellValue): string | null => {
  if (value === null) {
    return null;
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isNaN(value) ? null : String(value);
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return value.toISOString();
};

/**
 * Runs a per-value parser over a column. Absent inputs stay absent and are not
 * counted; every other input that parses to null counts as a failure.
 */
export const coerceValues = <T>(
  column: Column,
  parse: (value: Exclude<CellValue, null>) => T | null
): { values: (T | null)[]; attempted: number; failed: number; failRate: number } => {
  let attempted = 0;
  let failed = 0;
  const values = cellsOf(column).map((value) => {
    if (value === null) {
      return null;
    }
    attempted += 1;
    const parsed = parse(value);
    if (parsed === null) {
      failed += 1;
    }
    return parsed;
  });
  return { values, attempted, failed, failRate: attempted === 0 ? 0 : failed / attempted };
};
