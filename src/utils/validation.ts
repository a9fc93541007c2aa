import { z } from "zod";
import { DEFAULT_FORECAST_PERIODS, DEFAULT_ROLLING_WINDOW, DEFAULT_VOLATILITY_WINDOW } from "./constants";

/**
 * Zod validation schemas for request and input-file data.
 * These check shape only; ordering and domain rules are enforced by the core
 * and surface as typed analytics errors.
 */

/**
 * Schema for a single dated closing price.
 */
export const DatedPriceSchema = z.object({
  date: z.string().date(),
  price: z.number(),
});

/**
 * Schema for a price series on the wire (ordered by date).
 */
export const PriceSeriesSchema = z.array(DatedPriceSchema);

/**
 * Schema for the instrument map: identifier -> price series.
 */
export const InstrumentsSchema = z.record(z.string(), PriceSeriesSchema);

export const MetricsRequestSchema = z.object({
  series: PriceSeriesSchema,
});

/**
 * Schema for a recommendation request. The horizon is given directly or
 * derived from a target date; exactly one of the two is required.
 */
export const RecommendRequestSchema = z
  .object({
    instruments: InstrumentsSchema,
    goalAmount: z.number(),
    horizonYears: z.number().optional(),
    targetDate: z.string().date().optional(),
    zeroReturnFallback: z.boolean().optional(),
  })
  .refine((body) => (body.horizonYears === undefined) !== (body.targetDate === undefined), {
    message: "Provide exactly one of horizonYears or targetDate",
    path: ["horizonYears"],
  });

export const PlanRequestSchema = z.object({
  goalAmount: z.number(),
  horizonYears: z.number(),
  annualReturn: z.number(),
  zeroReturnFallback: z.boolean().optional(),
});

export const ForecastRequestSchema = z.object({
  series: z.array(
    z.object({
      date: z.string().date(),
      price: z.number().nullable(),
    })
  ),
  periods: z.number().int().positive().default(DEFAULT_FORECAST_PERIODS),
});

export const CorrelationRequestSchema = z.object({
  a: PriceSeriesSchema,
  b: PriceSeriesSchema,
  window: z.number().int().min(2).default(DEFAULT_ROLLING_WINDOW),
});

export const CorrelationMatrixRequestSchema = z.object({
  instruments: InstrumentsSchema,
});

export const PerformanceRequestSchema = z.object({
  series: PriceSeriesSchema,
  window: z.number().int().min(2).default(DEFAULT_VOLATILITY_WINDOW),
});

export type RecommendRequest = z.infer<typeof RecommendRequestSchema>;
