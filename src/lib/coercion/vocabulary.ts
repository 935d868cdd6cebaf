// Shared, read-only token tables for value coercion.

export const MISSING_TOKENS: ReadonlySet<string> = new Set([
  "",
  "na",
  "n/a",
  "null",
  "none",
  "nan",
  "-"
]);

export const TRUE_TOKENS: ReadonlySet<string> = new Set(["true", "t", "yes", "y", "1", "on"]);

export const FALSE_TOKENS: ReadonlySet<string> = new Set(["false", "f", "no", "n", "0", "off"]);

export const CURRENCY_AND_SEPARATORS = /[₩$€£¥,\s]+/g;

export const PARENTHESIS_NEGATIVE = /^\((.*)\)$/;

export const NON_NUMERIC_CHARACTERS = /[^0-9.+\-eE]/g;

export const NUMERIC_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
