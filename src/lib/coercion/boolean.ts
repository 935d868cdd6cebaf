import { booleanColumn } from "../table/table";
import type { BooleanColumn, CellValue, Column } from "../table/types";
import { coerceValues, toToken, type CoercionResult } from "./tokens";
import { FALSE_TOKENS, TRUE_TOKENS } from "./vocabulary";

export const parseBooleanToken = (token: string): boolean | null => {
  const normalized = token.trim().toLowerCase();
  if (TRUE_TOKENS.has(normalized)) {
    return true;
  }
  if (FALSE_TOKENS.has(normalized)) {
    return false;
  }
  return null;
};

export const parseBooleanCell = (value: CellValue): boolean | null => {
  if (typeof value === "boolean") {
    return value;
  }
  const token = toToken(value);
  return token === null ? null : parseBooleanToken(token);
};

export const coerceBooleanColumn = (column: Column): CoercionResult<BooleanColumn> => {
  const result = coerceValues(column, parseBooleanCell);
  return {
    column: booleanColumn(result.values),
    attempted: result.attempted,
    failed: result.failed,
    failRate: result.failRate
  };
};
