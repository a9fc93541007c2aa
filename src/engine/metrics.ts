import { PriceSeries } from "../models/PriceSeries";
import { Metrics, MetricsOptions } from "../models/Metrics";
import { InsufficientHistoryError, InvalidInputError } from "../models/errors";
import { mean, percentChanges, sampleStandardDeviation } from "../utils/math";
import { utcYear } from "../utils/time";

/**
 * Yearly closing price: the last observed price in a calendar year.
 */
export interface AnnualClose {
  year: number;
  price: number;
}

/**
 * Resample a series to one price per calendar year (last observation wins).
 * Years without observations are skipped, not filled.
 */
export function annualCloses(series: PriceSeries): AnnualClose[] {
  const closes: AnnualClose[] = [];
  for (const point of series) {
    const year = utcYear(point.timestamp);
    const last = closes[closes.length - 1];
    if (last && last.year === year) {
      last.price = point.price;
    } else {
      closes.push({ year, price: point.price });
    }
  }
  return closes;
}

/**
 * Year-over-year percentage change of consecutive yearly closes.
 * Length is (distinct years - 1).
 */
export function annualReturns(series: PriceSeries): number[] {
  return percentChanges(annualCloses(series).map((c) => c.price));
}

/**
 * Whole-series drawdown: (min - max) / max over every observed price.
 *
 * This compares the lowest price with the highest regardless of order, so a
 * series that bottoms before it peaks still reports a loss. It is the default
 * measure; see computeSequentialDrawdown for peak-to-trough.
 */
export function computeWholeSeriesDrawdown(series: PriceSeries): number {
  assertNonEmpty(series);
  let min = Infinity;
  let max = -Infinity;
  for (const point of series) {
    min = Math.min(min, point.price);
    max = Math.max(max, point.price);
  }
  return (min - max) / max;
}

/**
 * Largest decline from a running peak to a later trough, as a negative fraction.
 * Returns 0 for a series that never falls below a prior high.
 */
export function computeSequentialDrawdown(series: PriceSeries): number {
  assertNonEmpty(series);
  let peak = series[0].price;
  let worst = 0;
  for (const point of series) {
    peak = Math.max(peak, point.price);
    worst = Math.min(worst, (point.price - peak) / peak);
  }
  return worst;
}

/**
 * Derive risk/return metrics from a price series.
 *
 * @throws InvalidInputError for an empty series
 * @throws InsufficientHistoryError when the series spans fewer than 3 calendar years,
 * since volatility needs at least two annual returns
 */
export function computeMetrics(series: PriceSeries, options: MetricsOptions = {}): Metrics {
  assertNonEmpty(series);

  const returns = annualReturns(series);
  const avgAnnualReturn = mean(returns);
  const volatility = sampleStandardDeviation(returns);
  if (avgAnnualReturn === null || volatility === null) {
    throw new InsufficientHistoryError("series", 3, returns.length + 1, "distinct calendar years");
  }

  const maxDrawdown =
    options.drawdown === "sequential"
      ? computeSequentialDrawdown(series)
      : computeWholeSeriesDrawdown(series);

  return {
    avgAnnualReturn,
    volatility,
    maxDrawdown,
    latestPrice: series[series.length - 1].price,
  };
}

function assertNonEmpty(series: PriceSeries): void {
  if (series.length === 0) {
    throw new InvalidInputError("series", "at least one price point", 0);
  }
}
