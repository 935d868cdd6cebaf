import { isValid, parse, parseISO } from "date-fns";
import { datetimeColumn } from "../table/table";
import type { CellValue, Column, DatetimeColumn } from "../table/types";
import { coerceValues, type CoercionResult } from "./tokens";
import { MISSING_TOKENS } from "./vocabulary";

export type DatetimeParseOptions = {
  dayFirst?: boolean;
};

const ISO_PREFIX = /^\d{4}-\d{2}-\d{2}(?:$|[T ])/;
const YEAR_FIRST_PREFIX = /^\d{4}\D/;
const FOUR_DIGIT_YEAR = /\d{4}/;

const YEAR_FIRST_FORMATS = [
  "yyyy-MM-dd",
  "yyyy-MM-dd HH:mm",
  "yyyy.MM.dd",
  "yyyy/MM/dd",
  "yyyy/MM/dd HH:mm",
  "yyyy/MM/dd HH:mm:ss"
] as const;

const MONTH_FIRST_FORMATS = [
  "MM/dd/yyyy",
  "MM/dd/yyyy HH:mm",
  "MM/dd/yyyy HH:mm:ss",
  "MM-dd-yyyy"
] as const;

const DAY_FIRST_FORMATS = [
  "dd/MM/yyyy",
  "dd/MM/yyyy HH:mm",
  "dd/MM/yyyy HH:mm:ss",
  "dd-MM-yyyy",
  "dd.MM.yyyy"
] as const;

const NAMED_MONTH_FORMATS = [
  "MMM d, yyyy",
  "MMMM d, yyyy",
  "MMM d yyyy",
  "d MMM yyyy",
  "d MMMM yyyy"
] as const;

// fields a format omits come from this fixed midnight
const REFERENCE_DATE = new Date(2000, 0, 1);

const formatOrder = (yearFirst: boolean, dayFirst: boolean): readonly string[] => [
  ...(yearFirst ? YEAR_FIRST_FORMATS : []),
  ...(dayFirst ? DAY_FIRST_FORMATS : MONTH_FIRST_FORMATS),
  ...(dayFirst ? MONTH_FIRST_FORMATS : DAY_FIRST_FORMATS),
  ...NAMED_MONTH_FORMATS
];

/**
 * Tries ISO-8601 first, then the known textual layouts. Which of the two
 * ambiguous slash orders is tried first is decided by `dayFirst`; a layout
 * whose fields are out of range falls through to the next one.
 */
export const parseDatetimeToken = (
  token: string,
  options: DatetimeParseOptions = {}
): Date | null => {
  const text = token.trim();
  if (MISSING_TOKENS.has(text.toLowerCase())) {
    return null;
  }

  if (ISO_PREFIX.test(text)) {
    const parsed = parseISO(text);
    if (isValid(parsed)) {
      return parsed;
    }
  }
  // two-digit years are ambiguous and never accepted
  if (!FOUR_DIGIT_YEAR.test(text)) {
    return null;
  }

  for (const layout of formatOrder(YEAR_FIRST_PREFIX.test(text), options.dayFirst ?? false)) {
    const parsed = parse(text, layout, REFERENCE_DATE);
    if (isValid(parsed)) {
      return parsed;
    }
  }
  return null;
};

export const parseDatetimeCell = (
  value: CellValue,
  options: DatetimeParseOptions = {}
): Date | null => {
  if (value === null || typeof value === "boolean") {
    return null;
  }
  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }
  if (typeof value === "number") {
    const parsed = new Date(value);
    return Number.isFinite(value) && isValid(parsed) ? parsed : null;
  }
  return parseDatetimeToken(value, options);
};

export const coerceDatetimeColumn = (
  column: Column,
  options: DatetimeParseOptions = {}
): CoercionResult<DatetimeColumn> => {
  const result = coerceValues(column, (value) => parseDatetimeCell(value, options));
  return {
    column: datetimeColumn(result.values),
    attempted: result.attempted,
    failed: result.failed,
    failRate: result.failRate
  };
};
