import type { Column } from "./types";

export const presentNumbers = (values: readonly (number | null)[]): number[] =>
  values.filter((value): value is number => value !== null && !Number.isNaN(value));

export const numericValuesOf = (column: Column): number[] =>
  column.kind === "numeric" ? presentNumbers(column.values) : [];

const sortAscending = (values: readonly number[]): number[] =>
  [...values].sort((a, b) => a - b);

export const mean = (values: readonly number[]): number | null => {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
};

const sumOfSquares = (values: readonly number[], center: number): number =>
  values.reduce((sum, value) => sum + (value - center) ** 2, 0);

export const populationStd = (values: readonly number[]): number | null => {
  const center = mean(values);
  if (center === null) {
    return null;
  }
  return Math.sqrt(sumOfSquares(values, center) / values.length);
};

export const sampleStd = (values: readonly number[]): number | null => {
  const center = mean(values);
  if (center === null || values.length < 2) {
    return null;
  }
  return Math.sqrt(sumOfSquares(values, center) / (values.length - 1));
};

/**
 * Quantile with linear interpolation between the two closest ranks.
 */
export const quantile = (values: readonly number[], q: number): number | null => {
  if (values.length === 0) {
    return null;
  }
  const sorted = sortAscending(values);
  const position = (sorted.length - 1) * Math.min(1, Math.max(0, q));
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowerValue = sorted[lower];
  const upperValue = sorted[upper];
  return lowerValue + (upperValue - lowerValue) * (position - lower);
};

export const median = (values: readonly number[]): number | null => quantile(values, 0.5);

export const minMax = (values: readonly number[]): { min: number; max: number } | null => {
  if (values.length === 0) {
    return null;
  }
  let min = values[0];
  let max = values[0];
  values.forEach((value) => {
    if (value < min) min = value;
    if (value > max) max = value;
  });
  return { min, max };
};
