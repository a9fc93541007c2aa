import { InvalidInputError } from "./errors";
import { parseIsoDate } from "../utils/time";

/**
 * Trend forecast data structures
 */

export interface ForecastPoint {
  timestamp: number;
  price: number;
}

/**
 * Forecaster input point. Missing prices are allowed here and are dropped
 * before fitting.
 */
export interface ForecastInputPoint {
  timestamp: number;
  price: number | null;
}

/**
 * Wire shape of a forecast observation; price is null where it is missing.
 */
export interface DatedObservation {
  date: string;
  price: number | null;
}

/**
 * Build forecaster input from ISO-dated observations.
 * Dates must be strictly increasing (missing observations included) and every
 * present price finite and positive.
 */
export function fromDatedObservations(
  observations: ReadonlyArray<DatedObservation>
): ForecastInputPoint[] {
  const points = observations.map((o, index) => ({
    timestamp: parseIsoDate(o.date, `series[${index}].date`),
    price: o.price,
  }));

  points.forEach((point, index) => {
    if (point.price !== null && (!Number.isFinite(point.price) || point.price <= 0)) {
      throw new InvalidInputError(`series[${index}].price`, "a finite price > 0 or null", point.price);
    }
    if (index > 0 && point.timestamp <= points[index - 1].timestamp) {
      throw new InvalidInputError(
        `series[${index}].timestamp`,
        "strictly increasing timestamps",
        point.timestamp
      );
    }
  });

  return points;
}

export interface LinearTrend {
  slope: number;
  intercept: number;
}
