import { PriceSeries } from "../models/PriceSeries";
import { DivisionUndefinedError, InsufficientHistoryError, InvalidInputError } from "../models/errors";
import { pearsonCorrelation, percentChanges, sampleStandardDeviation } from "../utils/math";
import {
  DEFAULT_ROLLING_WINDOW,
  DEFAULT_VOLATILITY_WINDOW,
  MIN_CORRELATION_OBSERVATIONS,
  TRADING_DAYS_PER_YEAR,
} from "../utils/constants";

/**
 * Point-to-point return analytics used to compare instruments over short windows.
 */

export interface DatedReturn {
  timestamp: number;
  value: number;
}

export interface RollingCorrelationPoint {
  timestamp: number;
  correlation: number | null; // null where either leg is flat inside the window
}

export interface RollingVolatilityPoint {
  timestamp: number;
  volatility: number;
}

/**
 * Pairwise return correlations, rows and columns in `ids` order.
 * An entry is null where either instrument's returns are constant.
 */
export interface CorrelationMatrix {
  ids: string[];
  values: Array<Array<number | null>>;
  observations: number; // returns shared by every instrument
}

/**
 * Percentage change between consecutive points, dated at the later point
 */
export function dailyReturns(series: PriceSeries): DatedReturn[] {
  const changes = percentChanges(series.map((p) => p.price));
  return changes.map((value, i) => ({ timestamp: series[i + 1].timestamp, value }));
}

/**
 * Sample standard deviation of daily returns scaled by √252
 *
 * @throws InsufficientHistoryError for fewer than 2 returns
 */
export function annualizedVolatility(series: PriceSeries): number {
  const returns = dailyReturns(series).map((r) => r.value);
  const std = sampleStandardDeviation(returns);
  if (std === null) {
    throw new InsufficientHistoryError("series", 2, returns.length, "daily returns");
  }
  return std * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

/**
 * Sum of daily returns over the series (simple, not compounded)
 */
export function cumulativeReturn(series: PriceSeries): number {
  return dailyReturns(series).reduce((sum, r) => sum + r.value, 0);
}

/**
 * Rebase a series so its first price equals `base`.
 */
export function normalizePerformance(series: PriceSeries, base = 100): DatedReturn[] {
  if (series.length === 0) {
    return [];
  }
  const first = series[0].price;
  return series.map((p) => ({ timestamp: p.timestamp, value: (p.price / first) * base }));
}

/**
 * Daily returns of two series on the timestamps both have (inner join)
 */
export function alignReturns(
  a: PriceSeries,
  b: PriceSeries
): { timestamps: number[]; a: number[]; b: number[] } {
  const bByTimestamp = new Map(dailyReturns(b).map((r) => [r.timestamp, r.value] as const));
  const timestamps: number[] = [];
  const aValues: number[] = [];
  const bValues: number[] = [];

  for (const r of dailyReturns(a)) {
    const other = bByTimestamp.get(r.timestamp);
    if (other !== undefined) {
      timestamps.push(r.timestamp);
      aValues.push(r.value);
      bValues.push(other);
    }
  }
  return { timestamps, a: aValues, b: bValues };
}

/**
 * Pearson correlation of the two series' daily returns on shared dates.
 *
 * @throws InsufficientHistoryError when fewer than 2 shared returns exist
 * @throws DivisionUndefinedError when either leg's returns are constant
 */
export function returnCorrelation(a: PriceSeries, b: PriceSeries): number {
  const aligned = alignReturns(a, b);
  if (aligned.a.length < MIN_CORRELATION_OBSERVATIONS) {
    throw new InsufficientHistoryError("shared returns", MIN_CORRELATION_OBSERVATIONS, aligned.a.length, "dates");
  }
  const correlation = pearsonCorrelation(aligned.a, aligned.b);
  if (correlation === null) {
    throw new DivisionUndefinedError("returnCorrelation", "return variance");
  }
  return correlation;
}

/**
 * Annualized volatility over a trailing window of daily returns, one value per window end.
 */
export function rollingVolatility(
  series: PriceSeries,
  window: number = DEFAULT_VOLATILITY_WINDOW
): RollingVolatilityPoint[] {
  assertWindow(window);

  const returns = dailyReturns(series);
  const points: RollingVolatilityPoint[] = [];
  for (let end = window; end <= returns.length; end++) {
    const std = sampleStandardDeviation(returns.slice(end - window, end).map((r) => r.value));
    if (std !== null) {
      points.push({
        timestamp: returns[end - 1].timestamp,
        volatility: std * Math.sqrt(TRADING_DAYS_PER_YEAR),
      });
    }
  }
  return points;
}

/**
 * Correlation of every pair of instruments' daily returns, over the dates on
 * which all of them have a return. Instruments are ordered by identifier.
 *
 * @throws InvalidInputError when no instruments are given
 * @throws InsufficientHistoryError when fewer than 2 returns are shared by all
 */
export function correlationMatrix(instruments: Readonly<Record<string, PriceSeries>>): CorrelationMatrix {
  const entries = Object.entries(instruments).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  if (entries.length === 0) {
    throw new InvalidInputError("instruments", "at least one instrument", 0);
  }

  const returnsById = entries.map(
    ([, series]) => new Map(dailyReturns(series).map((r) => [r.timestamp, r.value] as const))
  );
  const columns: number[][] = entries.map(() => []);
  let observations = 0;

  for (const timestamp of returnsById[0].keys()) {
    const row: number[] = [];
    for (const returns of returnsById) {
      const value = returns.get(timestamp);
      if (value === undefined) {
        break;
      }
      row.push(value);
    }
    if (row.length === entries.length) {
      row.forEach((value, i) => columns[i].push(value));
      observations++;
    }
  }

  if (observations < MIN_CORRELATION_OBSERVATIONS) {
    throw new InsufficientHistoryError("shared returns", MIN_CORRELATION_OBSERVATIONS, observations, "dates");
  }

  const values = columns.map((x, i) =>
    columns.map((y, j) => {
      const correlation = pearsonCorrelation(x, y);
      // self-correlation is exactly 1 whenever it is defined
      return i === j && correlation !== null ? 1 : correlation;
    })
  );

  return { ids: entries.map(([id]) => id), values, observations };
}

/**
 * Correlation over a trailing window of shared returns, one value per window end.
 */
export function rollingCorrelation(
  a: PriceSeries,
  b: PriceSeries,
  window: number = DEFAULT_ROLLING_WINDOW
): RollingCorrelationPoint[] {
  assertWindow(window);

  const aligned = alignReturns(a, b);
  const points: RollingCorrelationPoint[] = [];
  for (let end = window; end <= aligned.a.length; end++) {
    points.push({
      timestamp: aligned.timestamps[end - 1],
      correlation: pearsonCorrelation(
        aligned.a.slice(end - window, end),
        aligned.b.slice(end - window, end)
      ),
    });
  }
  return points;
}

function assertWindow(window: number): void {
  if (!Number.isInteger(window) || window < 2) {
    throw new InvalidInputError("window", "an integer >= 2", window);
  }
}
