import { minMax, presentNumbers } from "../table/stats";

export type YeoJohnsonParameters = {
  lambda: number;
  mean: number;
  std: number;
};

export const LAMBDA_SEARCH_RANGE: readonly [number, number] = [-5, 5];

const EPSILON = 1e-12;
const LOG_MAX_VALUE = Math.log(Number.MAX_VALUE);
const GRID_STEPS = 40;

export const yeoJohnsonValue = (x: number, lambda: number): number => {
  if (x >= 0) {
    return Math.abs(lambda) < EPSILON ? Math.log1p(x) : ((x + 1) ** lambda - 1) / lambda;
  }
  return Math.abs(lambda - 2) < EPSILON
    ? -Math.log1p(-x)
    : -((1 - x) ** (2 - lambda) - 1) / (2 - lambda);
};

type Moments = {
  mean: number;
  std: number;
  logVariance: number;
};

// values are divided by their largest magnitude first so the squares stay finite
const momentsOf = (values: readonly number[]): Moments => {
  const scale = values.reduce((largest, value) => Math.max(largest, Math.abs(value)), 0);
  if (scale === 0) {
    return { mean: 0, std: 0, logVariance: -Infinity };
  }
  const scaled = values.map((value) => value / scale);
  const center = scaled.reduce((sum, value) => sum + value, 0) / scaled.length;
  const variance = scaled.reduce((sum, value) => sum + (value - center) ** 2, 0) / scaled.length;
  return {
    mean: center * scale,
    std: Math.sqrt(variance) * scale,
    logVariance: Math.log(variance) + 2 * Math.log(scale)
  };
};

/**
 * Negative log-likelihood of `lambda` under a normal model of the transformed values.
 * Infinite where the transform overflows or collapses the values to one point.
 */
export const yeoJohnsonNegativeLogLikelihood = (values: readonly number[], lambda: number): number => {
  const transformed = values.map((value) => yeoJohnsonValue(value, lambda));
  if (!transformed.every(Number.isFinite)) {
    return Infinity;
  }
  const { logVariance } = momentsOf(transformed);
  if (!Number.isFinite(logVariance)) {
    return Infinity;
  }
  const jacobian = values.reduce((sum, value) => sum + Math.sign(value) * Math.log1p(Math.abs(value)), 0);
  const result = (values.length / 2) * logVariance - (lambda - 1) * jacobian;
  return Number.isFinite(result) ? result : Infinity;
};

const GOLDEN_RATIO = (Math.sqrt(5) - 1) / 2;

export const goldenSectionMinimize = (
  objective: (x: number) => number,
  lower: number,
  upper: number,
  tolerance = 1e-8,
  maxIterations = 200
): number => {
  let a = lower;
  let b = upper;
  let c = b - GOLDEN_RATIO * (b - a);
  let d = a + GOLDEN_RATIO * (b - a);
  let fc = objective(c);
  let fd = objective(d);

  for (let iteration = 0; iteration < maxIterations && b - a > tolerance; iteration += 1) {
    if (fc < fd) {
      b = d;
      d = c;
      fd = fc;
      c = b - GOLDEN_RATIO * (b - a);
      fc = objective(c);
    } else {
      a = c;
      c = d;
      fc = fd;
      d = a + GOLDEN_RATIO * (b - a);
      fd = objective(d);
    }
  }
  return (a + b) / 2;
};

// lambdas for which (1 + |x|) raised to the transform's exponent stays below Number.MAX_VALUE
const feasibleLambdaRange = (min: number, max: number): [number, number] => {
  const [lower, upper] = LAMBDA_SEARCH_RANGE;
  const limit = 0.99 * LOG_MAX_VALUE;
  const high = max > 0 ? Math.min(upper, limit / Math.log1p(max)) : upper;
  const low = min < 0 ? Math.max(lower, 2 - limit / Math.log1p(-min)) : lower;
  return [low, high];
};

/**
 * Maximum-likelihood lambda. A coarse grid over the feasible range finds the basin,
 * golden-section search refines it. Falls back to 1 when no lambda gives a finite fit.
 */
export const fitYeoJohnsonLambda = (values: readonly (number | null)[]): number => {
  const present = presentNumbers(values);
  const range = minMax(present);
  if (range === null || range.min === range.max) {
    return 1;
  }
  const [low, high] = feasibleLambdaRange(range.min, range.max);
  if (!(low < high)) {
    return 1;
  }

  const objective = (lambda: number) => yeoJohnsonNegativeLogLikelihood(present, lambda);
  const step = (high - low) / GRID_STEPS;
  let bestIndex = -1;
  let bestValue = Infinity;
  for (let index = 0; index <= GRID_STEPS; index += 1) {
    const value = objective(low + index * step);
    if (value < bestValue) {
      bestIndex = index;
      bestValue = value;
    }
  }
  if (bestIndex < 0) {
    return 1;
  }

  const gridBest = low + bestIndex * step;
  const refined = goldenSectionMinimize(
    objective,
    Math.max(low, gridBest - step),
    Math.min(high, gridBest + step)
  );
  return objective(refined) <= bestValue ? refined : gridBest;
};

/**
 * Fits the power parameter by maximum likelihood, then the mean and population std of
 * the transformed values used to standardise them. A zero std becomes 1.
 */
export const fitYeoJohnson = (values: readonly (number | null)[]): YeoJohnsonParameters => {
  const lambda = fitYeoJohnsonLambda(values);
  const transformed = presentNumbers(values).map((value) => yeoJohnsonValue(value, lambda));
  if (transformed.length === 0) {
    return { lambda, mean: 0, std: 1 };
  }
  const moments = momentsOf(transformed);
  return {
    lambda,
    mean: moments.mean,
    std: moments.std === 0 ? 1 : moments.std
  };
};

export const applyYeoJohnson = (value: number, parameters: YeoJohnsonParameters): number =>
  (yeoJohnsonValue(value, parameters.lambda) - parameters.mean) / parameters.std;
