import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { ConfigurationError } from "../errors";
import { parseCsvText } from "./parseCsv";
import { parseXlsxBuffer } from "./parseXlsx";
import type { RawTable, TableFileType } from "./types";

export type ParseFileResult = {
  rawTables: RawTable[];
  activeTable: RawTable;
  fileType: TableFileType;
  sheetNames: string[];
};

export const parseTableFile = async (path: string): Promise<ParseFileResult> => {
  const extension = extname(path).slice(1).toLowerCase();
  if (extension === "csv") {
    const table = parseCsvText(await readFile(path, "utf8"));
    return { rawTables: [table], activeTable: table, fileType: "csv", sheetNames: [] };
  }

  if (extension === "xlsx") {
    const tables = parseXlsxBuffer(await readFile(path));
    const [first] = tables;
    if (!first) {
      throw new ConfigurationError(`No sheets detected in ${path}.`);
    }
    return {
      rawTables: tables,
      activeTable: first,
      fileType: "xlsx",
      sheetNames: tables.map((table) => table.sheetName ?? "Sheet")
    };
  }

  throw new ConfigurationError(`Unsupported file type ".${extension}": expected .csv or .xlsx.`);
};
