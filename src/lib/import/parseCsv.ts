import { TableShapeError } from "../errors";
import type { RawCell, RawTable } from "./types";

const numericPattern = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

const sanitizeText = (text: string): string =>
  text.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n").replace(/\r/g, "\n");

const DELIMITERS = [",", ";"] as const;

type Delimiter = (typeof DELIMITERS)[number];

const countOutsideQuotes = (line: string, delimiter: Delimiter): number => {
  let count = 0;
  let quoted = false;
  for (const char of line) {
    if (char === '"') {
      quoted = !quoted;
    } else if (char === delimiter && !quoted) {
      count += 1;
    }
  }
  return count;
};

// semicolon wins only when the header holds strictly more of them
const pickDelimiter = (headerLine: string): Delimiter =>
  countOutsideQuotes(headerLine, ";") > countOutsideQuotes(headerLine, ",") ? ";" : ",";

const splitFields = (line: string, delimiter: Delimiter): string[] => {
  const fields: string[] = [];
  let field = "";
  let quoted = false;
  let position = 0;

  while (position < line.length) {
    const char = line[position];
    if (quoted && char === '"' && line[position + 1] === '"') {
      field += '"';
      position += 2;
    } else if (char === '"') {
      quoted = !quoted;
      position += 1;
    } else if (char === delimiter && !quoted) {
      fields.push(field);
      field = "";
      position += 1;
    } else {
      field += char;
      position += 1;
    }
  }
  fields.push(field);
  return fields;
};

// plain numeric literals become numbers; anything else is left for the coercion engine
const toRawCell = (value: string): RawCell => {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  if (numericPattern.test(trimmed)) {
    const parsed = Number(trimmed);
    if (!Number.isNaN(parsed)) {
      return parsed;
    }
  }
  return trimmed;
};

// short rows are padded with absent cells, extra fields are dropped
const readRow = (fields: readonly string[], width: number): RawCell[] =>
  Array.from({ length: width }, (_, index) => toRawCell(fields[index] ?? ""));

export const buildHeaders = (rawHeaders: readonly RawCell[]): string[] =>
  rawHeaders.map((header, index) => {
    const label = header === null ? "" : String(header).trim();
    return label ? label : `Column ${index + 1}`;
  });

export const parseCsvText = (text: string): RawTable => {
  const lines = sanitizeText(text)
    .split("\n")
    .filter((line) => line.trim().length > 0);
  if (lines.length === 0) {
    throw new TableShapeError("CSV appears to be empty.");
  }

  const delimiter = pickDelimiter(lines[0]);
  const headerFields = splitFields(lines[0], delimiter);
  const headers = buildHeaders(readRow(headerFields, headerFields.length));
  const rows = lines.slice(1).map((line) => readRow(splitFields(line, delimiter), headers.length));

  return { headers, rows };
};
