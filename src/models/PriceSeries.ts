import { InvalidInputError } from "./errors";
import { parseIsoDate } from "../utils/time";

/**
 * Price series data structures
 */

export interface PricePoint {
  timestamp: number; // epoch milliseconds, calendar math is done in UTC
  price: number; // closing price, > 0
}

export type PriceSeries = ReadonlyArray<Readonly<PricePoint>>;

/**
 * Wire shape used by the API and the runner script.
 */
export interface DatedPrice {
  date: string; // ISO date, e.g. "2024-01-31"
  price: number;
}

/**
 * Build an immutable price series.
 * Timestamps must be strictly increasing and every price finite and positive.
 */
export function createPriceSeries(points: ReadonlyArray<PricePoint>): PriceSeries {
  const copy: Readonly<PricePoint>[] = [];

  points.forEach((point, index) => {
    if (!Number.isFinite(point.timestamp)) {
      throw new InvalidInputError(`series[${index}].timestamp`, "a finite epoch timestamp", point.timestamp);
    }
    if (!Number.isFinite(point.price) || point.price <= 0) {
      throw new InvalidInputError(`series[${index}].price`, "a finite price > 0", point.price);
    }
    if (index > 0 && point.timestamp <= points[index - 1].timestamp) {
      throw new InvalidInputError(
        `series[${index}].timestamp`,
        "strictly increasing timestamps",
        point.timestamp
      );
    }
    copy.push(Object.freeze({ timestamp: point.timestamp, price: point.price }));
  });

  return Object.freeze(copy);
}

/**
 * Build a price series from ISO-dated prices
 */
export function fromDatedPrices(prices: ReadonlyArray<DatedPrice>): PriceSeries {
  return createPriceSeries(
    prices.map((p, index) => ({
      timestamp: parseIsoDate(p.date, `series[${index}].date`),
      price: p.price,
    }))
  );
}
