import { columnNames, countAbsent, requireColumns } from "../table/table";
import type { Column, ColumnKind, Table } from "../table/types";

export type MissingSummaryRow = {
  column: string;
  missingCount: number;
  missingPct: number;
  nonMissingCount: number;
  dtype: ColumnKind;
};

export type MissingSortKey = "missingPct" | "missingCount" | "column";

export type MissingSummaryOptions = {
  columns?: readonly string[];
  sortBy?: MissingSortKey;
  descending?: boolean;
};

export type MissingPatternRow = {
  missingColumns: string[];
  patternCount: number;
  patternPct: number;
};

export type MissingReport = {
  summary: MissingSummaryRow[];
  pattern: MissingPatternRow[];
};

export const resolveTargetColumns = (
  table: Table,
  columns: readonly string[] | undefined,
  context: string
): string[] => {
  if (columns === undefined) {
    return columnNames(table);
  }
  requireColumns(table, columns, context);
  return [...columns];
};

const targetColumns = (table: Table, names: readonly string[]): [string, Column][] =>
  names.flatMap((name): [string, Column][] => {
    const column = table.columns.get(name);
    return column ? [[name, column]] : [];
  });

const compareBy = (key: MissingSortKey) => (a: MissingSummaryRow, b: MissingSummaryRow): number => {
  if (key === "column") {
    return a.column < b.column ? -1 : a.column > b.column ? 1 : 0;
  }
  return a[key] - b[key];
};

export const missingSummary = (
  table: Table,
  { columns, sortBy = "missingPct", descending = true }: MissingSummaryOptions = {}
): MissingSummaryRow[] => {
  const names = resolveTargetColumns(table, columns, "missingSummary");
  const total = table.rowCount;
  const rows = targetColumns(table, names).map(([name, column]) => {
    const missingCount = countAbsent(column);
    return {
      column: name,
      missingCount,
      missingPct: total > 0 ? (missingCount / total) * 100 : 0,
      nonMissingCount: total - missingCount,
      dtype: column.kind
    };
  });
  const compare = compareBy(sortBy);
  return rows.sort((a, b) => (descending ? compare(b, a) : compare(a, b)));
};

/**
 * Ranks the distinct sets of columns that are absent together in a row.
 * Rows with no absent cell are ignored; ties keep first-seen order.
 */
export const missingPattern = (
  table: Table,
  { columns, topN = 10 }: { columns?: readonly string[]; topN?: number } = {}
): MissingPatternRow[] => {
  const names = resolveTargetColumns(table, columns, "missingPattern");
  if (table.rowCount === 0) {
    return [];
  }
  const targets = targetColumns(table, names);
  const patterns = new Map<string, { missingColumns: string[]; count: number }>();

  for (let rowIndex = 0; rowIndex < table.rowCount; rowIndex += 1) {
    const missingColumns = targets
      .filter(([, column]) => column.values[rowIndex] === null)
      .map(([name]) => name);
    if (missingColumns.length === 0) {
      continue;
    }
    const key = JSON.stringify(missingColumns);
    const existing = patterns.get(key);
    if (existing) {
      existing.count += 1;
    } else {
      patterns.set(key, { missingColumns, count: 1 });
    }
  }

  return Array.from(patterns.values())
    .sort((a, b) => b.count - a.count)
    .slice(0, Math.max(0, topN))
    .map((pattern) => ({
      missingColumns: pattern.missingColumns,
      patternCount: pattern.count,
      patternPct: (pattern.count / table.rowCount) * 100
    }));
};

export const buildMissingReport = (
  table: Table,
  { columns, topNPatterns = 10 }: { columns?: readonly string[]; topNPatterns?: number } = {}
): MissingReport => ({
  summary: missingSummary(table, { columns }),
  pattern: missingPattern(table, { columns, topN: topNPatterns })
});
