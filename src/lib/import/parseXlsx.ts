import * as XLSX from "xlsx";
import { buildHeaders } from "./parseCsv";
import type { RawCell, RawTable } from "./types";

const normalizeCell = (value: unknown): RawCell => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "boolean") {
    return value ? "TRUE" : "FALSE";
  }
  const text = String(value).trim();
  return text ? text : null;
};

/**
 * Reads every sheet of a workbook; the first row of each sheet holds the headers.
 */
export const parseXlsxBuffer = (data: ArrayBuffer | Uint8Array): RawTable[] => {
  const workbook = XLSX.read(data, { type: data instanceof ArrayBuffer ? "array" : "buffer" });
  return workbook.SheetNames.flatMap((sheetName) => {
    const sheet = workbook.Sheets[sheetName];
    if (!sheet) {
      return [];
    }
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      blankrows: false
    });

    const headers = buildHeaders((rows[0] ?? []).map(normalizeCell));
    const dataRows = rows.slice(1).map((row) => headers.map((_, index) => normalizeCell(row[index])));

    return [{ sheetName, headers, rows: dataRows }];
  });
};
