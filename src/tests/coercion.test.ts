import { describe, expect, it } from "vitest";
import {
  coerceBooleanColumn,
  coerceCategoricalColumn,
  coerceNumericColumn,
  fixTypes,
  normalizeColumnNames,
  parseBooleanToken,
  parseDatetimeToken,
  parseNumericCell,
  parseNumericToken,
  typeFixSpecSchema
} from "../lib/coercion";
import { parsePolicy } from "../lib/config";
import { ConfigurationError } from "../lib/errors";
import { cellsOf, columnNames, createTable, numericColumn, textColumn } from "../lib/table/table";
import type { Table } from "../lib/table/types";

const timesOf = (table: Table, name: string) => {
  const column = table.columns.get(name);
  return (column ? cellsOf(column) : []).map((value) => (value instanceof Date ? value.getTime() : null));
};

describe("numeric coercion", () => {
  it("parses currency, parentheses and percent tokens", () => {
    const result = coerceNumericColumn(textColumn(["₩1,200", "(3,500)", "12.5%", "N/A"]));

    expect(result.column.values).toEqual([1200, -3500, 0.125, null]);
    expect(result.attempted).toBe(4);
    expect(result.failed).toBe(1);
    expect(result.failRate).toBe(0.25);
  });

  it("does not count absent inputs as failures", () => {
    const result = coerceNumericColumn(textColumn(["1", null, "abc"]));
    expect(result.column.values).toEqual([1, null, null]);
    expect(result.failRate).toBe(0.5);
  });

  it("maps booleans to 1/0", () => {
    expect(parseNumericCell(true)).toBe(1);
    expect(parseNumericCell(false)).toBe(0);
  });

  it("re-parses its own serialization", () => {
    [1234.5, -0.25, 3e-7].forEach((value) => {
      expect(parseNumericToken(String(value))).toBe(value);
    });
  });
});

describe("datetime coercion", () => {
  it("parses ISO dates", () => {
    const parsed = parseDatetimeToken("2026-01-15");
    expect(parsed?.getFullYear()).toBe(2026);
    expect(parsed?.getMonth()).toBe(0);
    expect(parsed?.getDate()).toBe(15);
  });

  it("resolves ambiguous slash dates by the dayFirst flag", () => {
    const monthFirst = parseDatetimeToken("03/04/2026");
    const dayFirst = parseDatetimeToken("03/04/2026", { dayFirst: true });

    expect(monthFirst?.getMonth()).toBe(2);
    expect(monthFirst?.getDate()).toBe(4);
    expect(dayFirst?.getMonth()).toBe(3);
    expect(dayFirst?.getDate()).toBe(3);
  });

  it("falls through to day-first when the month is out of range", () => {
    const parsed = parseDatetimeToken("13/04/2026");
    expect(parsed?.getMonth()).toBe(3);
    expect(parsed?.getDate()).toBe(13);
  });

  it("parses month names", () => {
    const parsed = parseDatetimeToken("Jan 5, 2026");
    expect(parsed?.getFullYear()).toBe(2026);
    expect(parsed?.getMonth()).toBe(0);
    expect(parsed?.getDate()).toBe(5);
  });

  it("returns null for unparsable text and two-digit years", () => {
    expect(parseDatetimeToken("not a date")).toBeNull();
    expect(parseDatetimeToken("01/02/26")).toBeNull();
  });

  it("round-trips ISO timestamps", () => {
    const value = new Date(Date.UTC(2026, 0, 15, 10, 30));
    expect(parseDatetimeToken(value.toISOString())?.getTime()).toBe(value.getTime());
  });
});

describe("boolean coercion", () => {
  it("maps the true/false vocabulary", () => {
    const result = coerceBooleanColumn(textColumn(["Yes", "n", "ON", "0", "maybe", null]));

    expect(result.column.values).toEqual([true, false, true, false, null, null]);
    expect(result.attempted).toBe(5);
    expect(result.failRate).toBe(0.2);
  });

  it("re-parses its own serialization", () => {
    expect(parseBooleanToken(String(true))).toBe(true);
    expect(parseBooleanToken(String(false))).toBe(false);
  });
});

describe("categorical coercion", () => {
  it("normalizes labels and folds rare ones", () => {
    const result = coerceCategoricalColumn(textColumn([" Red", "red", "BLUE", "green", null, ""]), {
      minFreq: 2
    });

    expect(result.column.values).toEqual(["red", "red", "Other", "Other", null, null]);
    expect(result.column.categories).toEqual(["Other", "red"]);
    expect(result.collapsed).toEqual(["blue", "green"]);
  });
});

describe("column names", () => {
  it("normalizes to snake case", () => {
    const table = createTable({
      "Order ID": numericColumn([1]),
      "Amount (KRW)": numericColumn([2]),
      "  ": numericColumn([3])
    });

    expect(columnNames(normalizeColumnNames(table))).toEqual(["order_id", "amount_krw", "column_3"]);
  });

  it("rejects names that collide after normalization", () => {
    const table = createTable({ "A b": numericColumn([1]), a_b: numericColumn([2]) });
    expect(() => normalizeColumnNames(table)).toThrow(ConfigurationError);
  });
});

describe("fixTypes", () => {
  const table = createTable({
    price: textColumn(["₩1,200", "(3,500)", "12.5%", "N/A"]),
    joined: textColumn(["2026-01-15", "03/04/2026", "bad", null]),
    active: textColumn(["y", "n", "yes", "x"]),
    color: textColumn(["a", "b", "a", "a"])
  });

  it("converts every listed column and reports each one", () => {
    const { table: fixed, report } = fixTypes(table, {
      numericColumns: ["price", "ghost"],
      datetimeColumns: ["joined"],
      booleanColumns: ["active"],
      categoricalColumns: ["color"],
      categoryMinFreq: 2
    });

    expect(report.map((row) => row.column)).toEqual(["active", "color", "ghost", "joined", "price"]);
    expect(report[0]).toEqual({
      column: "active",
      beforeType: "text",
      afterType: "boolean",
      parseFailRate: 0.25,
      note: "boolean coercion (y/n/yes/no/1/0/true/false/on/off)"
    });
    expect(report[1]).toEqual({
      column: "color",
      beforeType: "text",
      afterType: "categorical",
      parseFailRate: null,
      note: 'categorical coercion (minFreq=2, folded 1 into "Other")'
    });
    expect(report[2]).toEqual({
      column: "ghost",
      beforeType: "-",
      afterType: "-",
      parseFailRate: null,
      note: "SKIP: column not found"
    });
    expect(report[3].parseFailRate).toBeCloseTo(1 / 3, 10);
    expect(report[3].note).toBe("datetime coercion (month-first, errors->absent)");
    expect(report[4].parseFailRate).toBe(0.25);

    expect(fixed.columns.get("price")?.values).toEqual([1200, -3500, 0.125, null]);
    expect(fixed.columns.get("color")?.values).toEqual(["a", "Other", "a", "a"]);
    expect(table.columns.get("price")?.kind).toBe("text");
  });

  it("reads day-first dates when asked", () => {
    const { table: fixed, report } = fixTypes(table, { datetimeColumns: ["joined"], dayFirst: true });

    expect(timesOf(fixed, "joined")).toEqual([
      new Date(2026, 0, 15).getTime(),
      new Date(2026, 3, 3).getTime(),
      null,
      null
    ]);
    expect(report[0].note).toBe("datetime coercion (day-first, errors->absent)");
  });

  it("accepts dotted year-first and day-first layouts", () => {
    const dotted = createTable({ d: textColumn(["2026.01.15", "15.01.2026"]) });
    const { table: fixed, report } = fixTypes(dotted, { datetimeColumns: ["d"] });

    const expected = new Date(2026, 0, 15).getTime();
    expect(timesOf(fixed, "d")).toEqual([expected, expected]);
    expect(report[0].parseFailRate).toBe(0);
  });

  it("targets normalized names when column names are normalized first", () => {
    const messy = createTable({ "Unit Price": textColumn(["₩1,200"]) });
    const { table: fixed, report } = fixTypes(messy, {
      numericColumns: ["unit_price"],
      normalizeColumnNames: true
    });

    expect(columnNames(fixed)).toEqual(["unit_price"]);
    expect(fixed.columns.get("unit_price")?.values).toEqual([1200]);
    expect(report[0].afterType).toBe("numeric");
  });

  it("rejects a column listed under two kinds", () => {
    expect(() => fixTypes(table, { numericColumns: ["price"], booleanColumns: ["price"] })).toThrow(
      ConfigurationError
    );
  });

  it("rejects unknown options", () => {
    expect(() => parsePolicy(typeFixSpecSchema, { numericColumn: ["price"] }, "type fix spec")).toThrow(
      ConfigurationError
    );
  });
});
