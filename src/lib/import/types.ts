export type RawCell = string | number | null;

export type RawTable = {
  sheetName?: string;
  headers: string[];
  rows: RawCell[][];
};

export type TableFileType = "csv" | "xlsx";
