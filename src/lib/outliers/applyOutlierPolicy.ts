import { parsePolicy } from "../config";
import { createLogger } from "../logger";
import { presentNumbers } from "../table/stats";
import {
  booleanColumn,
  columnNames,
  countAbsent,
  filterRows,
  numericColumn,
  requireColumns,
  withColumns
} from "../table/table";
import type { Column, Table } from "../table/types";
import {
  capValues,
  detectOutliersMad,
  iqrBounds,
  outsideBounds,
  percentileBounds,
  type Bounds
} from "./detect";
import {
  outlierPolicySchema,
  type OutlierAction,
  type OutlierMethod,
  type OutlierPolicy,
  type OutlierPolicyInput
} from "./policy";

const logger = createLogger("outliers");

export const ROW_FILTER_COLUMN = "__ROW_FILTER__";

export type OutlierReportAction =
  | OutlierAction
  | "drop rows"
  | "skip (non-numeric)"
  | "skip (too few non-null)";

export type OutlierReportRow = {
  column: string;
  method: OutlierMethod;
  action: OutlierReportAction;
  nonNullCount: number;
  outlierCount: number;
  outlierRate: number;
  thresholdNote: string;
};

export type OutlierResult = {
  table: Table;
  report: OutlierReportRow[];
};

const roundRate = (value: number): number => Math.round(value * 1e6) / 1e6;

const formatBound = (value: number): string => String(Number(value.toPrecision(6)));

const describeBounds = (bounds: Bounds | null): string =>
  bounds === null ? "lo=-, hi=-" : `lo=${formatBound(bounds.lower)}, hi=${formatBound(bounds.upper)}`;

const detect = (
  values: readonly (number | null)[],
  policy: OutlierPolicy
): { mask: boolean[]; note: string } => {
  switch (policy.method) {
    case "iqr": {
      const bounds = iqrBounds(values, policy.iqrK);
      return {
        mask: outsideBounds(values, bounds),
        note: `iqr_k=${policy.iqrK}, ${describeBounds(bounds)}`
      };
    }
    case "mad":
      return { mask: detectOutliersMad(values, policy.madZ), note: `mad_z=${policy.madZ}` };
    case "pct": {
      const bounds = percentileBounds(values, policy.capLowerQ, policy.capUpperQ);
      return {
        mask: outsideBounds(values, bounds),
        note: `cap_q=[${policy.capLowerQ},${policy.capUpperQ}], ${describeBounds(bounds)}`
      };
    }
  }
};

const compareRows = (a: OutlierReportRow, b: OutlierReportRow): number => {
  if (a.action !== b.action) {
    return a.action < b.action ? -1 : 1;
  }
  return b.outlierRate - a.outlierRate;
};

const targetColumns = (table: Table, policy: OutlierPolicy): string[] => {
  if (policy.columns === undefined) {
    return columnNames(table).filter((name) => table.columns.get(name)?.kind === "numeric");
  }
  requireColumns(table, policy.columns, "applyOutlierPolicy");
  return [...policy.columns];
};

/**
 * Detects outliers per numeric column and caps, flags or drops them. Capping always
 * clamps to the `capLowerQ`/`capUpperQ` percentiles whatever the detection method.
 */
export const applyOutlierPolicy = (
  table: Table,
  policyInput: OutlierPolicyInput = {}
): OutlierResult => {
  const policy = parsePolicy(outlierPolicySchema, policyInput, "outlier policy");
  const targets = targetColumns(table, policy);

  const rows: OutlierReportRow[] = [];
  const updates: [string, Column][] = [];
  const dropMask: boolean[] = Array.from({ length: table.rowCount }, () => false);

  targets.forEach((name) => {
    const column = table.columns.get(name);
    if (!column) {
      return;
    }
    const base = { column: name, method: policy.method, outlierCount: 0, outlierRate: 0 };
    if (column.kind !== "numeric") {
      logger.warn(`column "${name}" skipped`, { reason: "non-numeric", kind: column.kind });
      rows.push({
        ...base,
        action: "skip (non-numeric)",
        nonNullCount: table.rowCount - countAbsent(column),
        thresholdNote: `kind=${column.kind}`
      });
      return;
    }

    const values = column.values;
    const nonNullCount = presentNumbers(values).length;
    if (nonNullCount < policy.minNonNull) {
      logger.warn(`column "${name}" skipped`, { reason: "too few non-null", nonNullCount });
      rows.push({
        ...base,
        action: "skip (too few non-null)",
        nonNullCount,
        thresholdNote: `min_non_null=${policy.minNonNull}`
      });
      return;
    }

    const { mask, note } = detect(values, policy);
    const outlierCount = mask.filter(Boolean).length;

    switch (policy.action) {
      case "flag":
        updates.push([`${name}${policy.flagSuffix}`, booleanColumn(mask)]);
        break;
      case "cap": {
        const bounds = percentileBounds(values, policy.capLowerQ, policy.capUpperQ);
        updates.push([name, numericColumn(capValues(values, bounds))]);
        break;
      }
      case "drop":
        mask.forEach((flagged, index) => {
          if (flagged) {
            dropMask[index] = true;
          }
        });
        break;
    }

    rows.push({
      column: name,
      method: policy.method,
      action: policy.action,
      nonNullCount,
      outlierCount,
      outlierRate: nonNullCount > 0 ? roundRate(outlierCount / nonNullCount) : 0,
      thresholdNote: note
    });
  });

  let result = withColumns(table, updates);
  if (policy.action === "drop") {
    const before = result.rowCount;
    result = filterRows(result, dropMask.map((flagged) => !flagged));
    const removed = before - result.rowCount;
    rows.push({
      column: ROW_FILTER_COLUMN,
      method: policy.method,
      action: "drop rows",
      nonNullCount: before,
      outlierCount: removed,
      outlierRate: before > 0 ? roundRate(removed / before) : 0,
      thresholdNote: `rows before=${before}, after=${result.rowCount}`
    });
  }

  logger.info("outlier policy applied", {
    method: policy.method,
    action: policy.action,
    columns: targets.length,
    rows: result.rowCount
  });
  return { table: result, report: rows.sort(compareRows) };
};
