import { median, presentNumbers, quantile } from "../table/stats";

export type Bounds = { lower: number; upper: number };

/**
 * `[Q1 - k*IQR, Q3 + k*IQR]`; a zero IQR collapses the bounds to `[Q1, Q3]`.
 */
export const iqrBounds = (values: readonly (number | null)[], k = 1.5): Bounds | null => {
  const present = presentNumbers(values);
  const q1 = quantile(present, 0.25);
  const q3 = quantile(present, 0.75);
  if (q1 === null || q3 === null) {
    return null;
  }
  const iqr = q3 - q1;
  if (iqr === 0) {
    return { lower: q1, upper: q3 };
  }
  return { lower: q1 - k * iqr, upper: q3 + k * iqr };
};

export const outsideBounds = (
  values: readonly (number | null)[],
  bounds: Bounds | null
): boolean[] =>
  values.map(
    (value) => bounds !== null && value !== null && (value < bounds.lower || value > bounds.upper)
  );

export const detectOutliersIqr = (values: readonly (number | null)[], k = 1.5): boolean[] =>
  outsideBounds(values, iqrBounds(values, k));

// 0.75 quantile of the standard normal
const MAD_SCALE = 0.6745;

export const robustZScores = (values: readonly (number | null)[]): (number | null)[] => {
  const present = presentNumbers(values);
  const center = median(present);
  const mad = center === null ? null : median(present.map((value) => Math.abs(value - center)));
  return values.map((value) => {
    if (value === null || center === null) {
      return null;
    }
    if (mad === null || mad === 0) {
      return 0;
    }
    return (MAD_SCALE * (value - center)) / mad;
  });
};

export const detectOutliersMad = (values: readonly (number | null)[], threshold = 3.5): boolean[] =>
  robustZScores(values).map((score) => score !== null && Math.abs(score) > threshold);

export const percentileBounds = (
  values: readonly (number | null)[],
  lowerQ = 0.01,
  upperQ = 0.99
): Bounds | null => {
  const present = presentNumbers(values);
  const lower = quantile(present, lowerQ);
  const upper = quantile(present, upperQ);
  return lower === null || upper === null ? null : { lower, upper };
};

/**
 * Clamps present values into `bounds`; absent values stay absent.
 */
export const capValues = (
  values: readonly (number | null)[],
  bounds: Bounds | null
): (number | null)[] =>
  values.map((value) => {
    if (value === null || bounds === null) {
      return value;
    }
    return Math.min(bounds.upper, Math.max(bounds.lower, value));
  });
