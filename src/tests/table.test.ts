import { describe, expect, it } from "vitest";
import { TableShapeError } from "../lib/errors";
import { mean, median, populationStd, quantile, sampleStd } from "../lib/table/stats";
import {
  booleanColumn,
  columnNames,
  compareCells,
  createTable,
  filterRows,
  fromRecords,
  numericColumn,
  textColumn,
  toRecords,
  withColumns
} from "../lib/table/table";

describe("table model", () => {
  it("normalizes NaN and undefined to absent", () => {
    expect(numericColumn([1, Number.NaN, undefined, 4]).values).toEqual([1, null, null, 4]);
  });

  it("rejects columns of unequal length", () => {
    expect(() =>
      createTable({ a: numericColumn([1, 2]), b: textColumn(["x"]) })
    ).toThrow(TableShapeError);
  });

  it("builds tables from records with value-based kinds", () => {
    const table = fromRecords([
      { a: 1, b: "x" },
      { a: null, c: true }
    ]);

    expect(columnNames(table)).toEqual(["a", "b", "c"]);
    expect(table.columns.get("a")).toEqual({ kind: "numeric", values: [1, null] });
    expect(table.columns.get("b")).toEqual({ kind: "text", values: ["x", null] });
    expect(table.columns.get("c")).toEqual({ kind: "boolean", values: [null, true] });
    expect(toRecords(table)).toEqual([
      { a: 1, b: "x", c: null },
      { a: null, b: null, c: true }
    ]);
  });

  it("filters rows across every column", () => {
    const table = createTable({
      a: numericColumn([1, 2, 3]),
      b: booleanColumn([true, false, null])
    });
    const filtered = filterRows(table, [true, false, true]);

    expect(filtered.rowCount).toBe(2);
    expect(filtered.columns.get("a")?.values).toEqual([1, 3]);
    expect(filtered.columns.get("b")?.values).toEqual([true, null]);
    expect(table.rowCount).toBe(3);
  });

  it("refuses to append a column of the wrong length", () => {
    const table = createTable({ a: numericColumn([1, 2, 3]) });
    expect(() => withColumns(table, [["b", numericColumn([1])]])).toThrow(TableShapeError);
  });

  it("sorts absent cells last", () => {
    expect([3, null, 1].sort(compareCells)).toEqual([1, 3, null]);
  });
});

describe("stats helpers", () => {
  it("interpolates quantiles between ranks", () => {
    const values = [1, 2, 3, 4, 5, 100];
    expect(quantile(values, 0.25)).toBe(2.25);
    expect(quantile(values, 0.75)).toBe(4.75);
    expect(median([4, 1, 3])).toBe(3);
  });

  it("distinguishes population and sample deviation", () => {
    expect(populationStd([10, 20, 30])).toBeCloseTo(8.16497, 5);
    expect(sampleStd([10, 20, 30])).toBe(10);
    expect(sampleStd([5])).toBeNull();
  });

  it("returns null on empty input", () => {
    expect(mean([])).toBeNull();
    expect(median([])).toBeNull();
    expect(populationStd([])).toBeNull();
  });
});
