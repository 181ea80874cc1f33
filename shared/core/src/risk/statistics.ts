/**
 * Return-series statistics used by PortfolioRisk.
 *
 * All functions are pure and take series oldest-first. Functions that can be
 * undefined for degenerate input (zero variance) return null; callers turn that
 * into an Undetermined estimate.
 */

export function mean(series: ReadonlyArray<number>): number {
  if (series.length === 0) return 0;
  let sum = 0;
  for (const value of series) {
    sum += value;
  }
  return sum / series.length;
}

/**
 * Last `n` observations of a series (the whole series when shorter).
 */
export function tail(series: ReadonlyArray<number>, n: number): number[] {
  return series.slice(Math.max(0, series.length - n));
}

/**
 * Sample covariance of two equal-length series.
 */
export function covariance(a: ReadonlyArray<number>, b: ReadonlyArray<number>): number {
  if (a.length !== b.length || a.length < 2) return 0;

  const meanA = mean(a);
  const meanB = mean(b);
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] - meanA) * (b[i] - meanB);
  }
  return sum / (a.length - 1);
}

export function variance(series: ReadonlyArray<number>): number {
  return covariance(series, series);
}

/**
 * Pearson correlation coefficient, clamped to [-1, 1].
 * Null when either series has zero variance.
 */
export function pearsonCorrelation(a: ReadonlyArray<number>, b: ReadonlyArray<number>): number | null {
  const varA = variance(a);
  const varB = variance(b);
  if (varA <= 0 || varB <= 0) return null;

  const r = covariance(a, b) / Math.sqrt(varA * varB);
  // Rounding can push |r| a hair past 1
  return Math.max(-1, Math.min(1, r));
}

/**
 * OLS slope of y regressed on x: cov(x, y) / var(x).
 * Null when x has zero variance.
 */
export function olsSlope(y: ReadonlyArray<number>, x: ReadonlyArray<number>): number | null {
  const varX = variance(x);
  if (varX <= 0) return null;
  return covariance(x, y) / varX;
}

/**
 * Historical-simulation quantile: sort ascending and take the order statistic
 * at floor(p * n).
 */
export function historicalQuantile(series: ReadonlyArray<number>, p: number): number {
  const sorted = [...series].sort((a, b) => a - b);
  // 1e-9 absorbs representation error such as (1 - 0.9) * 10 = 0.9999999999999998
  const index = Math.min(sorted.length - 1, Math.floor(p * sorted.length + 1e-9));
  return sorted[index];
}
