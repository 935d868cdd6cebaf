import { cellsOf, numericColumn, withColumns } from "../table/table";
import type { Column, Table } from "../table/types";
import { resolveTargetColumns } from "./summary";

/**
 * Appends one numeric 0/1 column per target marking the rows where it is absent.
 */
export const addMissingFlags = (
  table: Table,
  columns?: readonly string[],
  { suffix = "_is_missing" }: { suffix?: string } = {}
): Table => {
  const names = resolveTargetColumns(table, columns, "addMissingFlags");
  const flags = names.flatMap((name): [string, Column][] => {
    const column = table.columns.get(name);
    if (!column) {
      return [];
    }
    return [[`${name}${suffix}`, numericColumn(cellsOf(column).map((value) => (value === null ? 1 : 0)))]];
  });
  return withColumns(table, flags);
};
