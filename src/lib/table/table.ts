import { ConfigurationError, TableShapeError } from "../errors";
import type {
  BooleanColumn,
  CategoricalColumn,
  CellValue,
  Column,
  DatetimeColumn,
  NumericColumn,
  Table,
  TableRecord,
  TextColumn
} from "./types";

const isValidDate = (value: Date): boolean => !Number.isNaN(value.getTime());

export const numericColumn = (
  values: readonly (number | null | undefined)[]
): NumericColumn => ({
  kind: "numeric",
  values: values.map((value) =>
    value === null || value === undefined || Number.isNaN(value) ? null : value
  )
});

export const textColumn = (values: readonly (string | null | undefined)[]): TextColumn => ({
  kind: "text",
  values: values.map((value) => value ?? null)
});

export const booleanColumn = (
  values: readonly (boolean | null | undefined)[]
): BooleanColumn => ({
  kind: "boolean",
  values: values.map((value) => value ?? null)
});

export const datetimeColumn = (
  values: readonly (Date | null | undefined)[]
): DatetimeColumn => ({
  kind: "datetime",
  values: values.map((value) => (value && isValidDate(value) ? value : null))
});

const sortedCategories = (values: Iterable<string>): string[] =>
  Array.from(new Set(values)).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

export const categoricalColumn = (
  values: readonly (string | null | undefined)[],
  categories?: readonly string[]
): CategoricalColumn => {
  const normalized = values.map((value) => value ?? null);
  const present = normalized.filter((value): value is string => value !== null);
  return {
    kind: "categorical",
    values: normalized,
    categories: sortedCategories([...(categories ?? []), ...present])
  };
};

/**
 * Builds a column of the same kind as `column` from generic cells; cells that do not
 * fit the kind become absent.
 */
export const rebuildColumn = (column: Column, cells: readonly CellValue[]): Column => {
  switch (column.kind) {
    case "numeric":
      return numericColumn(cells.map((value) => (typeof value === "number" ? value : null)));
    case "text":
      return textColumn(cells.map((value) => (typeof value === "string" ? value : null)));
    case "boolean":
      return booleanColumn(cells.map((value) => (typeof value === "boolean" ? value : null)));
    case "datetime":
      return datetimeColumn(cells.map((value) => (value instanceof Date ? value : null)));
    case "categorical":
      return categoricalColumn(
        cells.map((value) => (typeof value === "string" ? value : null)),
        column.categories
      );
  }
};

export const tableFromEntries = (entries: Iterable<readonly [string, Column]>): Table => {
  const columns = new Map<string, Column>();
  let rowCount: number | null = null;

  for (const [name, column] of entries) {
    if (columns.has(name)) {
      throw new TableShapeError(`Duplicate column name: ${name}`, name);
    }
    if (rowCount === null) {
      rowCount = column.values.length;
    } else if (column.values.length !== rowCount) {
      throw new TableShapeError(
        `Column "${name}" has ${column.values.length} rows, expected ${rowCount}.`,
        name
      );
    }
    columns.set(name, column);
  }

  return { rowCount: rowCount ?? 0, columns };
};

export const createTable = (columns: Record<string, Column>): Table =>
  tableFromEntries(Object.entries(columns));

export const columnNames = (table: Table): string[] => Array.from(table.columns.keys());

export const getColumn = (table: Table, name: string): Column | undefined =>
  table.columns.get(name);

export const requireColumns = (table: Table, names: readonly string[], context: string): void => {
  const unknown = names.filter((name) => !table.columns.has(name));
  if (unknown.length > 0) {
    throw new ConfigurationError(`${context}: unknown columns ${unknown.join(", ")}`, [
      ...unknown.map((name) => `Unknown column: ${name}`)
    ]);
  }
};

export const cellsOf = (column: Column): readonly CellValue[] => column.values;

export const cellAt = (column: Column, rowIndex: number): CellValue =>
  column.values[rowIndex] ?? null;

export const countAbsent = (column: Column): number =>
  cellsOf(column).reduce<number>((count, value) => (value === null ? count + 1 : count), 0);

const rankKind = (value: Exclude<CellValue, null>): number => {
  if (typeof value === "boolean") return 0;
  if (typeof value === "number") return 1;
  if (value instanceof Date) return 2;
  return 3;
};

const scalarOf = (value: Exclude<CellValue, null>): number | string => {
  if (typeof value === "boolean") return value ? 1 : 0;
  if (value instanceof Date) return value.getTime();
  return value;
};

/**
 * Total order over non-absent cells; absent cells sort after everything else.
 */
export const compareCells = (left: CellValue, right: CellValue): number => {
  if (left === null || right === null) {
    if (left === right) return 0;
    return left === null ? 1 : -1;
  }
  const rankDiff = rankKind(left) - rankKind(right);
  if (rankDiff !== 0) {
    return rankDiff;
  }
  const a = scalarOf(left);
  const b = scalarOf(right);
  return a < b ? -1 : a > b ? 1 : 0;
};

export const cellKey = (value: CellValue): string => {
  if (value === null) return "null";
  if (typeof value === "number") return `num:${value}`;
  if (typeof value === "boolean") return `bool:${value}`;
  if (value instanceof Date) return `date:${value.getTime()}`;
  return `str:${value}`;
};

export const formatCell = (value: CellValue): string => {
  if (value === null) return "";
  if (value instanceof Date) return value.toISOString();
  return String(value);
};

const pickRows = (column: Column, indices: readonly number[]): Column => {
  switch (column.kind) {
    case "numeric":
      return { kind: "numeric", values: indices.map((index) => column.values[index] ?? null) };
    case "text":
      return { kind: "text", values: indices.map((index) => column.values[index] ?? null) };
    case "boolean":
      return { kind: "boolean", values: indices.map((index) => column.values[index] ?? null) };
    case "datetime":
      return { kind: "datetime", values: indices.map((index) => column.values[index] ?? null) };
    case "categorical":
      return {
        kind: "categorical",
        values: indices.map((index) => column.values[index] ?? null),
        categories: column.categories
      };
  }
};

export const takeRows = (table: Table, indices: readonly number[]): Table => {
  const columns = new Map<string, Column>();
  table.columns.forEach((column, name) => {
    columns.set(name, pickRows(column, indices));
  });
  return { rowCount: indices.length, columns };
};

export const filterRows = (table: Table, keep: readonly boolean[]): Table => {
  if (keep.length !== table.rowCount) {
    throw new TableShapeError(
      `Row mask has ${keep.length} entries, expected ${table.rowCount}.`
    );
  }
  const indices: number[] = [];
  keep.forEach((flag, index) => {
    if (flag) {
      indices.push(index);
    }
  });
  return takeRows(table, indices);
};

/**
 * Replaces columns that already exist (keeping their position) and appends new ones.
 */
export const withColumns = (
  table: Table,
  updates: Iterable<readonly [string, Column]>
): Table => {
  const columns = new Map(table.columns);
  let rowCount = table.columns.size === 0 ? null : table.rowCount;
  for (const [name, column] of updates) {
    if (rowCount === null) {
      rowCount = column.values.length;
    }
    if (column.values.length !== rowCount) {
      throw new TableShapeError(
        `Column "${name}" has ${column.values.length} rows, expected ${rowCount}.`,
        name
      );
    }
    columns.set(name, column);
  }
  return { rowCount: rowCount ?? 0, columns };
};

export const dropColumns = (table: Table, names: readonly string[]): Table => {
  const columns = new Map(table.columns);
  names.forEach((name) => columns.delete(name));
  return { rowCount: table.rowCount, columns };
};

export const renameColumns = (table: Table, rename: (name: string) => string): Table =>
  tableFromEntries(Array.from(table.columns, ([name, column]) => [rename(name), column] as const));

const inferColumn = (values: CellValue[]): Column => {
  const present = values.filter((value) => value !== null);
  if (present.length > 0 && present.every((value) => typeof value === "number")) {
    return numericColumn(values.map((value) => (typeof value === "number" ? value : null)));
  }
  if (present.length > 0 && present.every((value) => typeof value === "boolean")) {
    return booleanColumn(values.map((value) => (typeof value === "boolean" ? value : null)));
  }
  if (present.length > 0 && present.every((value) => value instanceof Date)) {
    return datetimeColumn(values.map((value) => (value instanceof Date ? value : null)));
  }
  return textColumn(
    values.map((value) => {
      if (value === null) return null;
      if (value instanceof Date) return value.toISOString();
      return String(value);
    })
  );
};

/**
 * Builds a table from row objects. Keys are collected in first-seen order and a
 * key missing from a record is an absent cell.
 */
export const fromRecords = (records: readonly TableRecord[]): Table => {
  const names: string[] = [];
  const seen = new Set<string>();
  records.forEach((record) => {
    Object.keys(record).forEach((key) => {
      if (!seen.has(key)) {
        seen.add(key);
        names.push(key);
      }
    });
  });

  return tableFromEntries(
    names.map((name) => [name, inferColumn(records.map((record) => record[name] ?? null))] as const)
  );
};

export const toRecords = (table: Table): Record<string, CellValue>[] =>
  Array.from({ length: table.rowCount }, (_, rowIndex) => {
    const record: Record<string, CellValue> = {};
    table.columns.forEach((column, name) => {
      record[name] = cellAt(column, rowIndex);
    });
    return record;
  });
