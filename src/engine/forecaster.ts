import { ForecastInputPoint, ForecastPoint } from "../models/Forecast";
import { InvalidInputError } from "../models/errors";
import { fitLinearTrend } from "../utils/math";
import { addDays } from "../utils/time";

/**
 * Project a linear price trend forward.
 *
 * The trend is fitted on index position (0, 1, 2, ... after dropping missing
 * prices), not elapsed time, and forecasts are dated one calendar day apart
 * after the last observed point whatever the spacing of the input.
 *
 * @param series - Observed points; prices may be missing (null)
 * @param periods - Number of future points, a positive integer
 * @returns Forecast points, or an empty array when fewer than 2 prices are present
 */
export function forecast(
  series: ReadonlyArray<ForecastInputPoint>,
  periods: number
): ForecastPoint[] {
  if (!Number.isInteger(periods) || periods <= 0) {
    throw new InvalidInputError("periods", "a positive integer", periods);
  }

  const observed = series.filter(
    (p): p is { timestamp: number; price: number } => p.price !== null && Number.isFinite(p.price)
  );

  const trend = fitLinearTrend(observed.map((p) => p.price));
  if (trend === null) {
    return [];
  }

  const lastTimestamp = observed[observed.length - 1].timestamp;
  const points: ForecastPoint[] = [];
  for (let k = 1; k <= periods; k++) {
    const position = observed.length - 1 + k;
    points.push({
      timestamp: addDays(lastTimestamp, k),
      price: trend.intercept + trend.slope * position,
    });
  }
  return points;
}
