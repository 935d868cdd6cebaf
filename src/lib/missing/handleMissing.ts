import { parsePolicy } from "../config";
import { ConfigurationError } from "../errors";
import { createLogger } from "../logger";
import { mean, median } from "../table/stats";
import {
  cellKey,
  cellsOf,
  compareCells,
  countAbsent,
  dropColumns,
  filterRows,
  formatCell,
  rebuildColumn,
  takeRows,
  withColumns
} from "../table/table";
import type { CellValue, Column, ColumnKind, Table } from "../table/types";
import {
  backwardFill,
  fillAbsent,
  fillAlongOrder,
  forwardFill,
  interpolateLinear,
  modeOf
} from "./fill";
import {
  GROUP_STRATEGIES,
  missingPolicySchema,
  type MissingPolicy,
  type MissingPolicyInput,
  type MissingStrategy
} from "./policy";
import { resolveTargetColumns } from "./summary";

const logger = createLogger("missing");

export type MissingOutcome = "filled" | "skipped" | "dropped_rows" | "dropped_column" | "kept";

export type MissingHandlingRow = {
  column: string;
  strategy: MissingStrategy;
  outcome: MissingOutcome;
  missingBefore: number;
  missingAfter: number | null;
  note: string;
};

export type MissingHandlingResult = {
  table: Table;
  report: MissingHandlingRow[];
};

type FillOutcome = { cells: CellValue[]; note: string } | { skip: string };

type FillContext = {
  policy: MissingPolicy;
  order: readonly number[];
  groupKeys: readonly CellValue[] | null;
};

const TIME_STRATEGIES: ReadonlySet<MissingStrategy> = new Set([
  "ffill",
  "bfill",
  "interpolate_linear"
]);

const NUMERIC_STRATEGIES: ReadonlySet<MissingStrategy> = new Set([
  "mean",
  "median",
  "group_median",
  "interpolate_linear"
]);

const constantFits = (kind: ColumnKind, value: CellValue): boolean => {
  switch (kind) {
    case "numeric":
      return typeof value === "number";
    case "boolean":
      return typeof value === "boolean";
    case "datetime":
      return value instanceof Date;
    case "text":
    case "categorical":
      return typeof value === "string";
  }
};

const validate = (table: Table, policy: MissingPolicy, targets: readonly string[]): void => {
  const issues: string[] = [];
  if (GROUP_STRATEGIES.has(policy.strategy) && policy.groupByColumn !== undefined) {
    if (!table.columns.has(policy.groupByColumn)) {
      issues.push(`groupByColumn "${policy.groupByColumn}" not found in table.`);
    }
  }
  if (TIME_STRATEGIES.has(policy.strategy) && policy.timeColumn !== undefined) {
    if (!table.columns.has(policy.timeColumn)) {
      issues.push(`timeColumn "${policy.timeColumn}" not found in table.`);
    }
  }
  if (policy.strategy === "constant") {
    targets.forEach((name) => {
      const column = table.columns.get(name);
      if (column && !constantFits(column.kind, policy.constantValue)) {
        issues.push(`constantValue does not fit ${column.kind} column "${name}".`);
      }
    });
  }
  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid missing-value policy: ${issues[0]}`, issues);
  }
};

/**
 * Row indices in ascending time order; absent keys go last and ties keep row order.
 */
export const timeOrder = (table: Table, timeColumn: string | undefined): number[] => {
  const indices = Array.from({ length: table.rowCount }, (_, index) => index);
  const column = timeColumn === undefined ? undefined : table.columns.get(timeColumn);
  if (!column) {
    return indices;
  }
  const keys = cellsOf(column);
  return indices.sort((a, b) => compareCells(keys[a] ?? null, keys[b] ?? null) || a - b);
};

const fillByGroup = (
  cells: readonly CellValue[],
  groupKeys: readonly CellValue[],
  statistic: (values: CellValue[]) => CellValue
): CellValue[] => {
  const buckets = new Map<string, CellValue[]>();
  cells.forEach((value, index) => {
    const key = groupKeys[index] ?? null;
    if (key === null || value === null) {
      return;
    }
    const bucketKey = cellKey(key);
    const bucket = buckets.get(bucketKey);
    if (bucket) {
      bucket.push(value);
    } else {
      buckets.set(bucketKey, [value]);
    }
  });

  const fills = new Map<string, CellValue>();
  buckets.forEach((values, key) => fills.set(key, statistic(values)));

  return cells.map((value, index) => {
    const key = groupKeys[index] ?? null;
    if (value !== null || key === null) {
      return value;
    }
    return fills.get(cellKey(key)) ?? null;
  });
};

const numbersIn = (values: readonly CellValue[]): number[] =>
  values.filter((value): value is number => typeof value === "number");

const numericMedian = (values: readonly CellValue[]): number | null => median(numbersIn(values));

const fillColumn = (column: Column, { policy, order, groupKeys }: FillContext): FillOutcome => {
  const cells = cellsOf(column);
  const { strategy } = policy;

  if (NUMERIC_STRATEGIES.has(strategy) && column.kind !== "numeric") {
    return { skip: `non-numeric column (${column.kind})` };
  }

  switch (strategy) {
    case "constant":
      return { cells: fillAbsent(cells, policy.constantValue), note: "filled with constant" };
    case "mean":
    case "median": {
      const numbers = numbersIn(cells);
      const value = strategy === "mean" ? mean(numbers) : median(numbers);
      if (value === null) {
        return { skip: "no values to fill from" };
      }
      return { cells: fillAbsent(cells, value), note: `${strategy}=${value}` };
    }
    case "mode": {
      const value = modeOf(cells);
      if (value === null) {
        return { skip: "no values to fill from" };
      }
      return { cells: fillAbsent(cells, value), note: `mode=${formatCell(value)}` };
    }
    case "group_median":
    case "group_mode": {
      if (groupKeys === null) {
        return { skip: "group column unavailable" };
      }
      const statistic = strategy === "group_median" ? numericMedian : modeOf;
      return {
        cells: fillByGroup(cells, groupKeys, statistic),
        note: `by ${policy.groupByColumn ?? "group"}`
      };
    }
    case "ffill":
      return { cells: fillAlongOrder(cells, order, forwardFill), note: "forward fill" };
    case "bfill":
      return { cells: fillAlongOrder(cells, order, backwardFill), note: "backward fill" };
    case "interpolate_linear": {
      const numbers = cells.map((value) => (typeof value === "number" ? value : null));
      if (numbers.every((value) => value === null)) {
        return { skip: "no values to fill from" };
      }
      return {
        cells: fillAlongOrder(numbers, order, interpolateLinear),
        note: "linear interpolation"
      };
    }
    case "drop_rows":
    case "drop_cols":
      return { skip: `strategy ${strategy} does not fill` };
  }
};

const dropRows = (
  table: Table,
  policy: MissingPolicy,
  targets: readonly string[]
): MissingHandlingResult => {
  const columns = targets.flatMap((name) => {
    const column = table.columns.get(name);
    return column ? [cellsOf(column)] : [];
  });
  const keep = Array.from({ length: table.rowCount }, (_, rowIndex) =>
    columns.every((cells) => cells[rowIndex] !== null)
  );
  const result = filterRows(table, keep);
  const removed = table.rowCount - result.rowCount;

  const report = targets.map((name): MissingHandlingRow => {
    const before = table.columns.get(name);
    const after = result.columns.get(name);
    return {
      column: name,
      strategy: policy.strategy,
      outcome: "dropped_rows",
      missingBefore: before ? countAbsent(before) : 0,
      missingAfter: after ? countAbsent(after) : 0,
      note: `rows before=${table.rowCount}, after=${result.rowCount} (removed ${removed})`
    };
  });
  return { table: result, report };
};

const dropSparseColumns = (
  table: Table,
  policy: MissingPolicy,
  targets: readonly string[]
): MissingHandlingResult => {
  const toDrop: string[] = [];
  const report = targets.map((name): MissingHandlingRow => {
    const column = table.columns.get(name);
    const missingBefore = column ? countAbsent(column) : 0;
    const pct = table.rowCount > 0 ? (missingBefore / table.rowCount) * 100 : 0;
    const drop = pct >= policy.dropThresholdPct;
    if (drop) {
      toDrop.push(name);
    }
    return {
      column: name,
      strategy: policy.strategy,
      outcome: drop ? "dropped_column" : "kept",
      missingBefore,
      missingAfter: drop ? null : missingBefore,
      note: `missing ${pct.toFixed(1)}% ${drop ? ">=" : "<"} ${policy.dropThresholdPct}%`
    };
  });
  return { table: dropColumns(table, toDrop), report };
};

/**
 * Applies one missing-value strategy to the target columns (default: all columns) and
 * reports what happened to each of them.
 */
export const handleMissing = (
  table: Table,
  policyInput: MissingPolicyInput = {}
): MissingHandlingResult => {
  const policy = parsePolicy(missingPolicySchema, policyInput, "missing-value policy");
  const targets = resolveTargetColumns(table, policy.columns, "handleMissing");
  validate(table, policy, targets);

  if (policy.strategy === "drop_rows") {
    const result = dropRows(table, policy, targets);
    logger.info("missing rows dropped", { before: table.rowCount, after: result.table.rowCount });
    return result;
  }
  if (policy.strategy === "drop_cols") {
    const result = dropSparseColumns(table, policy, targets);
    logger.info("sparse columns checked", { threshold: policy.dropThresholdPct });
    return result;
  }

  let working = table;
  let order = timeOrder(table, undefined);
  if (TIME_STRATEGIES.has(policy.strategy) && policy.timeColumn !== undefined) {
    const sorted = timeOrder(table, policy.timeColumn);
    if (policy.sortTime) {
      working = takeRows(table, sorted);
    } else {
      order = sorted;
    }
  }

  const groupColumn =
    policy.groupByColumn === undefined ? undefined : working.columns.get(policy.groupByColumn);
  const context: FillContext = {
    policy,
    order,
    groupKeys: groupColumn ? cellsOf(groupColumn) : null
  };

  const updates: [string, Column][] = [];
  const report = targets.map((name): MissingHandlingRow => {
    const column = working.columns.get(name);
    if (!column) {
      return {
        column: name,
        strategy: policy.strategy,
        outcome: "skipped",
        missingBefore: 0,
        missingAfter: 0,
        note: "column not found"
      };
    }
    const missingBefore = countAbsent(column);
    const base = { column: name, strategy: policy.strategy, missingBefore };
    if (missingBefore === 0) {
      return { ...base, outcome: "kept", missingAfter: 0, note: "no absent values" };
    }

    const outcome = fillColumn(column, context);
    if ("skip" in outcome) {
      logger.warn(`column "${name}" skipped`, { strategy: policy.strategy, reason: outcome.skip });
      return { ...base, outcome: "skipped", missingAfter: missingBefore, note: outcome.skip };
    }

    const filled = rebuildColumn(column, outcome.cells);
    updates.push([name, filled]);
    const missingAfter = countAbsent(filled);
    const note =
      missingAfter > 0 ? `${outcome.note}; ${missingAfter} left absent` : outcome.note;
    return { ...base, outcome: "filled", missingAfter, note };
  });

  logger.info("missing values handled", {
    strategy: policy.strategy,
    columns: targets.length,
    filled: updates.length
  });
  return { table: withColumns(working, updates), report };
};
