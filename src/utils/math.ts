/**
 * Statistical and financial calculation utilities.
 * Functions here are total: they return null where a statistic is undefined
 * and leave it to the engine layer to raise the matching typed error.
 */

import { LinearTrend } from "../models/Forecast";

/**
 * Arithmetic mean. Returns null for an empty sequence.
 */
export function mean(values: ReadonlyArray<number>): number | null {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Sample standard deviation (n - 1 denominator).
 * Returns null for fewer than 2 values.
 *
 * @example
 * ```ts
 * sampleStandardDeviation([2, 4, 4, 4, 5, 5, 7, 9]) // ≈ 2.138
 * ```
 */
export function sampleStandardDeviation(values: ReadonlyArray<number>): number | null {
  const avg = mean(values);
  if (avg === null || values.length < 2) {
    return null;
  }
  const squared = values.reduce((sum, v) => sum + (v - avg) * (v - avg), 0);
  return Math.sqrt(squared / (values.length - 1));
}

/**
 * Percentage change between consecutive values.
 * Formula: r_i = v_i / v_{i-1} - 1
 *
 * @returns Sequence one shorter than the input
 */
export function percentChanges(values: ReadonlyArray<number>): number[] {
  const changes: number[] = [];
  for (let i = 1; i < values.length; i++) {
    changes.push(values[i] / values[i - 1] - 1);
  }
  return changes;
}

/**
 * Ordinary least-squares fit of values against their index position (0, 1, 2, ...).
 * Returns null for fewer than 2 values.
 */
export function fitLinearTrend(values: ReadonlyArray<number>): LinearTrend | null {
  const n = values.length;
  if (n < 2) {
    return null;
  }

  const xMean = (n - 1) / 2;
  const yMean = values.reduce((sum, v) => sum + v, 0) / n;

  let covariance = 0;
  let xVariance = 0;
  for (let x = 0; x < n; x++) {
    covariance += (x - xMean) * (values[x] - yMean);
    xVariance += (x - xMean) * (x - xMean);
  }

  const slope = covariance / xVariance;
  return { slope, intercept: yMean - slope * xMean };
}

/**
 * Pearson correlation coefficient of two equal-length sequences.
 * Returns null when fewer than 2 pairs exist or either side has zero variance.
 */
export function pearsonCorrelation(
  xs: ReadonlyArray<number>,
  ys: ReadonlyArray<number>
): number | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) {
    return null;
  }

  let xSum = 0;
  let ySum = 0;
  for (let i = 0; i < n; i++) {
    xSum += xs[i];
    ySum += ys[i];
  }
  const xMean = xSum / n;
  const yMean = ySum / n;

  let covariance = 0;
  let xVariance = 0;
  let yVariance = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - xMean;
    const dy = ys[i] - yMean;
    covariance += dx * dy;
    xVariance += dx * dx;
    yVariance += dy * dy;
  }

  if (xVariance === 0 || yVariance === 0) {
    return null;
  }
  return covariance / Math.sqrt(xVariance * yVariance);
}

/**
 * Calculates the future value of an annuity of equal periodic payments.
 * Formula: FV = PMT × [(1 + r)^n - 1] / r
 *
 * @param payment - Contribution made at the end of each period
 * @param rate - Growth rate per period as a decimal
 * @param periods - Number of periods
 */
export function futureValueOfAnnuity(payment: number, rate: number, periods: number): number {
  if (rate === 0) {
    return payment * periods;
  }
  return payment * ((Math.pow(1 + rate, periods) - 1) / rate);
}

/**
 * Solves the annuity formula for the payment that reaches a target future value.
 * Formula: PMT = FV × r / [(1 + r)^n - 1]
 *
 * Callers must exclude rate = 0 (and fractional powers of negative bases)
 * before calling; this function does not guard them.
 */
export function requiredContribution(targetValue: number, rate: number, periods: number): number {
  return (targetValue * rate) / (Math.pow(1 + rate, periods) - 1);
}
