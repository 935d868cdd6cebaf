export type ColumnKind = "numeric" | "text" | "boolean" | "datetime" | "categorical";

export type NumericColumn = {
  kind: "numeric";
  values: readonly (number | null)[];
};

export type TextColumn = {
  kind: "text";
  values: readonly (string | null)[];
};

export type BooleanColumn = {
  kind: "boolean";
  values: readonly (boolean | null)[];
};

export type DatetimeColumn = {
  kind: "datetime";
  values: readonly (Date | null)[];
};

export type CategoricalColumn = {
  kind: "categorical";
  values: readonly (string | null)[];
  categories: readonly string[];
};

export type Column =
  | NumericColumn
  | TextColumn
  | BooleanColumn
  | DatetimeColumn
  | CategoricalColumn;

// null is the absent marker for every column kind
export type CellValue = number | string | boolean | Date | null;

export type Table = {
  readonly rowCount: number;
  readonly columns: ReadonlyMap<string, Column>;
};

export type TableRecord = Record<string, CellValue | undefined>;
