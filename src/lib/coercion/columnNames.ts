import { ConfigurationError } from "../errors";
import { columnNames, renameColumns } from "../table/table";
import type { Table } from "../table/types";

export type ColumnNameOptions = {
  lower?: boolean;
  replaceSpaces?: boolean;
};

export const normalizeColumnName = (
  name: string,
  index: number,
  { lower = true, replaceSpaces = true }: ColumnNameOptions = {}
): string => {
  let normalized = name.trim();
  if (lower) {
    normalized = normalized.toLowerCase();
  }
  if (replaceSpaces) {
    normalized = normalized.replace(/\s+/g, "_");
  }
  const disallowed = lower ? /[^a-z0-9_]+/g : /[^A-Za-z0-9_]+/g;
  normalized = normalized
    .replace(disallowed, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
  return normalized || `column_${index + 1}`;
};

/**
 * "Order ID" -> "order_id", "Amount (KRW)" -> "amount_krw".
 */
export const normalizeColumnNames = (table: Table, options: ColumnNameOptions = {}): Table => {
  const names = columnNames(table);
  const mapping = new Map(names.map((name, index) => [name, normalizeColumnName(name, index, options)]));

  const seen = new Map<string, string>();
  const collisions: string[] = [];
  mapping.forEach((target, source) => {
    const previous = seen.get(target);
    if (previous !== undefined) {
      collisions.push(`"${previous}" and "${source}" both become "${target}"`);
    }
    seen.set(target, source);
  });
  if (collisions.length > 0) {
    throw new ConfigurationError(
      `Column names collide after normalization: ${collisions.join("; ")}`,
      collisions
    );
  }

  return renameColumns(table, (name) => mapping.get(name) ?? name);
};
