import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../lib/errors";
import {
  applyOutlierPolicy,
  capValues,
  detectOutliersIqr,
  detectOutliersMad,
  iqrBounds,
  percentileBounds,
  robustZScores
} from "../lib/outliers";
import { columnNames, createTable, numericColumn, textColumn } from "../lib/table/table";

const sample = [1, 2, 3, 4, 5, 100];

const buildTable = () =>
  createTable({
    x: numericColumn(sample),
    label: textColumn(["a", "b", "c", "d", "e", "f"])
  });

describe("outlier detection", () => {
  it("flags only the extreme value with the IQR rule", () => {
    expect(iqrBounds(sample)).toEqual({ lower: -1.5, upper: 8.5 });
    expect(detectOutliersIqr(sample)).toEqual([false, false, false, false, false, true]);
  });

  it("collapses bounds to the quartiles when the IQR is zero", () => {
    expect(iqrBounds([5, 5, 5, 5])).toEqual({ lower: 5, upper: 5 });
  });

  it("scores values by median absolute deviation", () => {
    const scores = robustZScores([1, 2, 3, 4, 100]);
    expect(scores[2]).toBe(0);
    expect(scores[4]).toBeCloseTo(65.4265, 4);
    expect(detectOutliersMad([1, 2, 3, 4, 100])).toEqual([false, false, false, false, true]);
  });

  it("treats a zero MAD as no outliers", () => {
    expect(robustZScores([5, 5, 5, 9, null])).toEqual([0, 0, 0, 0, null]);
    expect(detectOutliersMad([5, 5, 5, 9])).toEqual([false, false, false, false]);
  });

  it("caps values idempotently and keeps absent values", () => {
    const bounds = percentileBounds([1, 2, 3, 4, 5], 0.25, 0.75);
    expect(bounds).toEqual({ lower: 2, upper: 4 });

    const once = capValues([1, 3, 10, null], bounds);
    expect(once).toEqual([2, 3, 4, null]);
    expect(capValues(once, bounds)).toEqual(once);
  });
});

describe("applyOutlierPolicy", () => {
  it("appends a flag column", () => {
    const { table, report } = applyOutlierPolicy(buildTable(), { action: "flag", minNonNull: 5 });

    expect(columnNames(table)).toEqual(["x", "label", "x__is_outlier"]);
    expect(table.columns.get("x__is_outlier")?.values).toEqual([false, false, false, false, false, true]);
    expect(table.columns.get("x")?.values).toEqual(sample);
    expect(report).toEqual([
      {
        column: "x",
        method: "iqr",
        action: "flag",
        nonNullCount: 6,
        outlierCount: 1,
        outlierRate: 0.166667,
        thresholdNote: "iqr_k=1.5, lo=-1.5, hi=8.5"
      }
    ]);
  });

  it("flags absent cells as not outlying", () => {
    const withGap = createTable({ x: numericColumn([1, 2, 3, null, 4, 5, 100]) });
    const { table, report } = applyOutlierPolicy(withGap, { action: "flag", minNonNull: 5 });

    expect(table.columns.get("x__is_outlier")?.values).toEqual([false, false, false, false, false, false, true]);
    expect(table.columns.get("x")?.values).toEqual([1, 2, 3, null, 4, 5, 100]);
    expect(report[0].nonNullCount).toBe(6);
    expect(report[0].outlierCount).toBe(1);
  });

  it("drops flagged rows and records the row filter", () => {
    const { table, report } = applyOutlierPolicy(buildTable(), { action: "drop", minNonNull: 5 });

    expect(table.rowCount).toBe(5);
    expect(table.columns.get("x")?.values).toEqual([1, 2, 3, 4, 5]);
    expect(table.columns.get("label")?.values).toEqual(["a", "b", "c", "d", "e"]);
    expect(report.map((row) => row.action)).toEqual(["drop", "drop rows"]);
    expect(report[1]).toEqual({
      column: "__ROW_FILTER__",
      method: "iqr",
      action: "drop rows",
      nonNullCount: 6,
      outlierCount: 1,
      outlierRate: 0.166667,
      thresholdNote: "rows before=6, after=5"
    });
  });

  it("caps to the configured percentiles", () => {
    const { table } = applyOutlierPolicy(buildTable(), { minNonNull: 5 });
    const values = table.columns.get("x")?.values ?? [];

    expect(values).toHaveLength(6);
    expect(values[0]).toBeCloseTo(1.05, 10);
    expect(values[1]).toBe(2);
    expect(values[5]).toBeCloseTo(95.25, 8);
  });

  it("skips columns with too few values", () => {
    const { table, report } = applyOutlierPolicy(buildTable(), { method: "mad" });

    expect(table.columns.get("x")?.values).toEqual(sample);
    expect(report).toEqual([
      {
        column: "x",
        method: "mad",
        action: "skip (too few non-null)",
        nonNullCount: 6,
        outlierCount: 0,
        outlierRate: 0,
        thresholdNote: "min_non_null=30"
      }
    ]);
  });

  it("reports a requested non-numeric column", () => {
    const { report } = applyOutlierPolicy(buildTable(), { columns: ["label"], minNonNull: 1 });
    expect(report[0].action).toBe("skip (non-numeric)");
    expect(report[0].nonNullCount).toBe(6);
  });

  it("describes the percentile method bounds", () => {
    const { report } = applyOutlierPolicy(buildTable(), {
      method: "pct",
      action: "flag",
      capLowerQ: 0.2,
      capUpperQ: 0.8,
      minNonNull: 5
    });
    expect(report[0].thresholdNote).toBe("cap_q=[0.2,0.8], lo=2, hi=5");
    expect(report[0].outlierCount).toBe(2);
  });

  it("rejects invalid policies", () => {
    expect(() => applyOutlierPolicy(buildTable(), { columns: ["nope"] })).toThrow(ConfigurationError);
    expect(() => applyOutlierPolicy(buildTable(), { capLowerQ: 0.9, capUpperQ: 0.1 })).toThrow(
      ConfigurationError
    );
  });
});
