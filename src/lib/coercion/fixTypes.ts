import { parsePolicy } from "../config";
import { createLogger } from "../logger";
import { getColumn, withColumns } from "../table/table";
import type { Column, ColumnKind, Table } from "../table/types";
import { coerceBooleanColumn } from "./boolean";
import { coerceCategoricalColumn } from "./categorical";
import { normalizeColumnNames } from "./columnNames";
import { coerceDatetimeColumn } from "./datetime";
import { coerceNumericColumn } from "./numeric";
import { typeFixSpecSchema, type TypeFixSpec, type TypeFixSpecInput } from "./spec";

const logger = createLogger("coercion");

export type TypeFixReportRow = {
  column: string;
  beforeType: ColumnKind | "-";
  afterType: ColumnKind | "-";
  parseFailRate: number | null;
  note: string;
};

export type TypeFixResult = {
  table: Table;
  report: TypeFixReportRow[];
};

type Converted = { column: Column; failRate: number | null; note: string };

type TargetRule = {
  columns: (spec: TypeFixSpec) => readonly string[];
  convert: (column: Column, spec: TypeFixSpec) => Converted;
};

const TARGET_RULES: readonly TargetRule[] = [
  {
    columns: (spec) => spec.numericColumns,
    convert: (column) => {
      const result = coerceNumericColumn(column);
      return {
        column: result.column,
        failRate: result.failRate,
        note: "numeric coercion (currency/commas/parentheses/percent)"
      };
    }
  },
  {
    columns: (spec) => spec.datetimeColumns,
    convert: (column, spec) => {
      const result = coerceDatetimeColumn(column, { dayFirst: spec.dayFirst });
      return {
        column: result.column,
        failRate: result.failRate,
        note: `datetime coercion (${spec.dayFirst ? "day-first" : "month-first"}, errors->absent)`
      };
    }
  },
  {
    columns: (spec) => spec.booleanColumns,
    convert: (column) => {
      const result = coerceBooleanColumn(column);
      return {
        column: result.column,
        failRate: result.failRate,
        note: "boolean coercion (y/n/yes/no/1/0/true/false/on/off)"
      };
    }
  },
  {
    columns: (spec) => spec.categoricalColumns,
    convert: (column, spec) => {
      const result = coerceCategoricalColumn(column, {
        minFreq: spec.categoryMinFreq,
        otherLabel: spec.otherLabel
      });
      const folded =
        result.collapsed.length > 0 ? `, folded ${result.collapsed.length} into "${spec.otherLabel}"` : "";
      return {
        column: result.column,
        failRate: null,
        note: `categorical coercion (minFreq=${spec.categoryMinFreq}${folded})`
      };
    }
  }
];

const byColumn = (a: TypeFixReportRow, b: TypeFixReportRow): number =>
  a.column < b.column ? -1 : a.column > b.column ? 1 : 0;

/**
 * Converts the listed columns to their target kinds. Columns that are not in
 * the table get a SKIP row in the report instead of failing the whole spec.
 */
export const fixTypes = (table: Table, specInput: TypeFixSpecInput = {}): TypeFixResult => {
  const spec = parsePolicy(typeFixSpecSchema, specInput, "type fix spec");
  const source = spec.normalizeColumnNames ? normalizeColumnNames(table) : table;

  const report: TypeFixReportRow[] = [];
  const updates: [string, Column][] = [];

  TARGET_RULES.forEach((rule) => {
    rule.columns(spec).forEach((name) => {
      const column = getColumn(source, name);
      if (!column) {
        logger.warn("column not found, skipping", { column: name });
        report.push({
          column: name,
          beforeType: "-",
          afterType: "-",
          parseFailRate: null,
          note: "SKIP: column not found"
        });
        return;
      }
      const converted = rule.convert(column, spec);
      updates.push([name, converted.column]);
      report.push({
        column: name,
        beforeType: column.kind,
        afterType: converted.column.kind,
        parseFailRate: converted.failRate,
        note: converted.note
      });
    });
  });

  logger.info("types fixed", {
    converted: updates.length,
    skipped: report.length - updates.length
  });

  return {
    table: withColumns(source, updates),
    report: report.sort(byColumn)
  };
};
