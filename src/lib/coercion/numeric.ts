import { numericColumn } from "../table/table";
import type { CellValue, Column, NumericColumn } from "../table/types";
import { coerceValues, type CoercionResult } from "./tokens";
import {
  CURRENCY_AND_SEPARATORS,
  MISSING_TOKENS,
  NON_NUMERIC_CHARACTERS,
  NUMERIC_LITERAL,
  PARENTHESIS_NEGATIVE
} from "./vocabulary";

/**
 * Parses loosely formatted numbers such as "₩1,200", "(3,500)" or "12.5%".
 * Returns null for sentinel tokens ("N/A", "null", "-") and anything unparsable.
 */
export const parseNumericToken = (token: string): number | null => {
  let text = token.trim();
  if (MISSING_TOKENS.has(text.toLowerCase())) {
    return null;
  }

  const parenthesized = PARENTHESIS_NEGATIVE.exec(text);
  if (parenthesized) {
    text = `-${parenthesized[1]}`;
  }

  text = text.replace(CURRENCY_AND_SEPARATORS, "");

  const isPercent = text.endsWith("%");
  if (isPercent) {
    text = text.slice(0, -1);
  }

  text = text.replace(NON_NUMERIC_CHARACTERS, "");
  if (!NUMERIC_LITERAL.test(text)) {
    return null;
  }

  const parsed = Number(text);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  return isPercent ? parsed / 100 : parsed;
};

export const parseNumericCell = (value: CellValue): number | null => {
  if (value === null) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isNaN(value) ? null : value;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? null : time;
  }
  return parseNumericToken(value);
};

export const coerceNumericColumn = (column: Column): CoercionResult<NumericColumn> => {
  const result = coerceValues(column, parseNumericCell);
  return {
    column: numericColumn(result.values),
    attempted: result.attempted,
    failed: result.failed,
    failRate: result.failRate
  };
};
