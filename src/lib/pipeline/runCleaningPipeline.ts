import { fixTypes, type TypeFixReportRow, type TypeFixSpecInput } from "../coercion";
import { createLogger } from "../logger";
import {
  compareMissingBeforeAfter,
  handleMissing,
  type MissingComparisonRow,
  type MissingHandlingRow,
  type MissingPolicyInput
} from "../missing";
import {
  buildNormalizationReport,
  FeatureNormalizer,
  type NormalizationReportRow,
  type NormalizationSpecInput
} from "../normalization";
import { applyOutlierPolicy, type OutlierPolicyInput, type OutlierReportRow } from "../outliers";
import type { Table } from "../table/types";

const logger = createLogger("pipeline");

export type CleaningPipelineOptions = {
  typeFix?: TypeFixSpecInput;
  missing?: MissingPolicyInput | MissingPolicyInput[];
  outliers?: OutlierPolicyInput;
  /** A spec fits a new normalizer on the table; a fitted normalizer is only applied. */
  normalization?: NormalizationSpecInput | FeatureNormalizer;
};

export type CleaningPipelineReports = {
  typeFix: TypeFixReportRow[] | null;
  missing: MissingHandlingRow[][];
  missingComparison: MissingComparisonRow[] | null;
  outliers: OutlierReportRow[] | null;
  normalization: NormalizationReportRow[] | null;
};

export type CleaningPipelineResult = {
  table: Table;
  reports: CleaningPipelineReports;
  normalizer: FeatureNormalizer | null;
};

const toPolicyList = (
  missing: CleaningPipelineOptions["missing"]
): readonly MissingPolicyInput[] => {
  if (missing === undefined) {
    return [];
  }
  return Array.isArray(missing) ? missing : [missing];
};

const normalize = (
  table: Table,
  normalization: NormalizationSpecInput | FeatureNormalizer
): { table: Table; normalizer: FeatureNormalizer; report: NormalizationReportRow[] } => {
  const normalizer =
    normalization instanceof FeatureNormalizer ? normalization : new FeatureNormalizer(normalization);
  const output = normalizer.isFitted() ? normalizer.transform(table) : normalizer.fitTransform(table);
  const parameters = normalizer.getFittedParameters();
  const columns = parameters ? Object.keys(parameters.columns) : [];
  return {
    table: output,
    normalizer,
    report: buildNormalizationReport(table, output, columns)
  };
};

/**
 * Runs the requested stages in order: type-fix, missing values, outliers, normalization.
 * Stages without options are skipped.
 */
export const runCleaningPipeline = (
  input: Table,
  options: CleaningPipelineOptions = {}
): CleaningPipelineResult => {
  const reports: CleaningPipelineReports = {
    typeFix: null,
    missing: [],
    missingComparison: null,
    outliers: null,
    normalization: null
  };
  let table = input;
  let normalizer: FeatureNormalizer | null = null;

  if (options.typeFix !== undefined) {
    const result = fixTypes(table, options.typeFix);
    table = result.table;
    reports.typeFix = result.report;
  }

  const policies = toPolicyList(options.missing);
  if (policies.length > 0) {
    const beforeMissing = table;
    policies.forEach((policy) => {
      const result = handleMissing(table, policy);
      table = result.table;
      reports.missing.push(result.report);
    });
    reports.missingComparison = compareMissingBeforeAfter(beforeMissing, table);
  }

  if (options.outliers !== undefined) {
    const result = applyOutlierPolicy(table, options.outliers);
    table = result.table;
    reports.outliers = result.report;
  }

  if (options.normalization !== undefined) {
    const result = normalize(table, options.normalization);
    table = result.table;
    normalizer = result.normalizer;
    reports.normalization = result.report;
  }

  logger.info("pipeline finished", { rowsIn: input.rowCount, rowsOut: table.rowCount });
  return { table, reports, normalizer };
};
