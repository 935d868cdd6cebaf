import { numericColumn, tableFromEntries, textColumn } from "../table/table";
import type { Column, Table } from "../table/types";
import type { RawCell, RawTable } from "./types";

const uniqueHeaders = (headers: readonly string[]): string[] => {
  const seen = new Map<string, number>();
  return headers.map((header) => {
    const count = (seen.get(header) ?? 0) + 1;
    seen.set(header, count);
    return count === 1 ? header : `${header}_${count}`;
  });
};

const rawColumn = (cells: readonly RawCell[]): Column => {
  if (cells.every((cell) => cell === null || typeof cell === "number")) {
    return numericColumn(cells.map((cell) => (typeof cell === "number" ? cell : null)));
  }
  return textColumn(cells.map((cell) => (cell === null ? null : String(cell))));
};

/**
 * Columns whose present cells are all numbers become numeric, the rest text.
 * Repeated headers get a `_2`, `_3` suffix.
 */
export const tableFromRaw = (raw: RawTable): Table => {
  const headers = uniqueHeaders(raw.headers);
  return tableFromEntries(
    headers.map((header, index) => [header, rawColumn(raw.rows.map((row) => row[index] ?? null))] as const)
  );
};
