import { parsePolicy } from "../config";
import { ConfigurationError, NotFittedError } from "../errors";
import { createLogger } from "../logger";
import { mean, median, minMax, numericValuesOf, populationStd, quantile } from "../table/stats";
import { columnNames, numericColumn, withColumns } from "../table/table";
import type { Column, NumericColumn, Table } from "../table/types";
import {
  normalizationSpecSchema,
  type NormalizationMethod,
  type NormalizationSpec,
  type NormalizationSpecInput
} from "./spec";
import { applyYeoJohnson, fitYeoJohnson, type YeoJohnsonParameters } from "./yeoJohnson";

const logger = createLogger("normalization");

export type StandardParameters = { mean: number; std: number };
export type MinMaxParameters = { min: number; max: number };
export type RobustParameters = { median: number; iqr: number };
export type LogParameters = { floor: number };

export type FittedParameters =
  | { method: "standard"; columns: Readonly<Record<string, Readonly<StandardParameters>>> }
  | { method: "minmax"; columns: Readonly<Record<string, Readonly<MinMaxParameters>>> }
  | { method: "robust"; columns: Readonly<Record<string, Readonly<RobustParameters>>> }
  | { method: "log"; columns: Readonly<Record<string, Readonly<LogParameters>>> }
  | { method: "yeo_johnson"; columns: Readonly<Record<string, Readonly<YeoJohnsonParameters>>> };

type ValueTransform = (value: number) => number;

const orOne = (value: number | null): number => (value === null || value === 0 ? 1 : value);

const fitColumns = <P>(
  names: readonly string[],
  table: Table,
  fit: (values: number[], column: NumericColumn) => P
): Readonly<Record<string, Readonly<P>>> => {
  const columns: Record<string, Readonly<P>> = {};
  names.forEach((name) => {
    const column = table.columns.get(name);
    if (column && column.kind === "numeric") {
      columns[name] = Object.freeze(fit(numericValuesOf(column), column));
    }
  });
  return Object.freeze(columns);
};

const fitParameters = (
  method: NormalizationMethod,
  names: readonly string[],
  table: Table
): FittedParameters => {
  switch (method) {
    case "standard":
      return {
        method,
        columns: fitColumns(names, table, (values) => ({
          mean: mean(values) ?? 0,
          std: orOne(populationStd(values))
        }))
      };
    case "minmax":
      return {
        method,
        columns: fitColumns(names, table, (values) => {
          const range = minMax(values);
          return range === null ? { min: 0, max: 1 } : { min: range.min, max: range.max };
        })
      };
    case "robust":
      return {
        method,
        columns: fitColumns(names, table, (values) => {
          const q1 = quantile(values, 0.25);
          const q3 = quantile(values, 0.75);
          return {
            median: median(values) ?? 0,
            iqr: q1 === null || q3 === null ? 1 : orOne(q3 - q1)
          };
        })
      };
    case "log":
      return { method, columns: fitColumns(names, table, () => ({ floor: 0 })) };
    case "yeo_johnson":
      return {
        method,
        columns: fitColumns(names, table, (_values, column) => fitYeoJohnson(column.values))
      };
  }
};

const transformFor = (parameters: FittedParameters, name: string): ValueTransform | null => {
  switch (parameters.method) {
    case "standard": {
      const fitted = parameters.columns[name];
      return fitted ? (value) => (value - fitted.mean) / fitted.std : null;
    }
    case "minmax": {
      const fitted = parameters.columns[name];
      if (!fitted) return null;
      const range = fitted.max - fitted.min || 1;
      return (value) => (value - fitted.min) / range;
    }
    case "robust": {
      const fitted = parameters.columns[name];
      return fitted ? (value) => (value - fitted.median) / fitted.iqr : null;
    }
    case "log": {
      const fitted = parameters.columns[name];
      return fitted ? (value) => Math.log1p(Math.max(fitted.floor, value)) : null;
    }
    case "yeo_johnson": {
      const fitted = parameters.columns[name];
      return fitted ? (value) => applyYeoJohnson(value, fitted) : null;
    }
  }
};

/**
 * Learns scaling statistics on one table and applies them unchanged to others.
 * The `log` method needs no fit; every other method throws NotFittedError when
 * `transform` is called first.
 */
export class FeatureNormalizer {
  readonly spec: Readonly<NormalizationSpec>;
  private parameters: FittedParameters | null = null;

  constructor(specInput: NormalizationSpecInput = {}) {
    this.spec = parsePolicy(normalizationSpecSchema, specInput, "normalization spec");
  }

  get method(): NormalizationMethod {
    return this.spec.method;
  }

  isFitted(): boolean {
    return this.parameters !== null;
  }

  fit(table: Table): this {
    const names = this.resolveColumns(table, "fit");
    this.parameters = Object.freeze(fitParameters(this.spec.method, names, table));
    logger.info("normalizer fitted", { method: this.spec.method, columns: names });
    return this;
  }

  transform(table: Table): Table {
    const parameters = this.parametersFor(table);
    const names = Object.keys(parameters.columns);
    this.checkColumns(table, names, "transform");

    const updates: [string, Column][] = [];
    names.forEach((name) => {
      const column = table.columns.get(name);
      const apply = transformFor(parameters, name);
      if (!column || column.kind !== "numeric" || apply === null) {
        return;
      }
      const values = column.values.map((value) => (value === null ? null : this.clip(apply(value))));
      updates.push([name, numericColumn(values)]);
    });

    logger.debug("normalizer applied", { method: this.spec.method, rows: table.rowCount });
    return withColumns(table, updates);
  }

  fitTransform(table: Table): Table {
    return this.fit(table).transform(table);
  }

  getFittedParameters(): Readonly<FittedParameters> | null {
    return this.parameters;
  }

  private parametersFor(table: Table): FittedParameters {
    if (this.parameters !== null) {
      return this.parameters;
    }
    if (this.spec.method === "log") {
      return fitParameters("log", this.resolveColumns(table, "transform"), table);
    }
    throw new NotFittedError(this.spec.method);
  }

  private clip(value: number): number {
    if (!this.spec.clip) {
      return value;
    }
    const [low, high] = this.spec.clipRange;
    return Math.min(high, Math.max(low, value));
  }

  private resolveColumns(table: Table, operation: string): string[] {
    if (this.spec.columns === undefined) {
      return columnNames(table).filter((name) => table.columns.get(name)?.kind === "numeric");
    }
    this.checkColumns(table, this.spec.columns, operation);
    return [...this.spec.columns];
  }

  private checkColumns(table: Table, names: readonly string[], operation: string): void {
    const issues = names.flatMap((name) => {
      const column = table.columns.get(name);
      if (!column) {
        return [`Unknown column: ${name}`];
      }
      return column.kind === "numeric" ? [] : [`Column "${name}" is ${column.kind}, expected numeric`];
    });
    if (issues.length > 0) {
      throw new ConfigurationError(`FeatureNormalizer.${operation}: ${issues.join("; ")}`, issues);
    }
  }
}
