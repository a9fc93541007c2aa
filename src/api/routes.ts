import { Router, Request, Response } from "express";
import { ZodError } from "zod";
import { PriceSeries, fromDatedPrices } from "../models/PriceSeries";
import { fromDatedObservations } from "../models/Forecast";
import { isAnalyticsError } from "../models/errors";
import { computeMetrics, computeSequentialDrawdown } from "../engine/metrics";
import { forecast } from "../engine/forecaster";
import {
  annualizedVolatility,
  correlationMatrix,
  cumulativeReturn,
  normalizePerformance,
  returnCorrelation,
  rollingCorrelation,
  rollingVolatility,
} from "../engine/returns";
import { planContributions } from "../planner/contributionPlanner";
import { InvestmentPlanner } from "../planner/investmentPlanner";
import { formatIsoDate, horizonFromTargetDate } from "../utils/time";
import {
  CorrelationMatrixRequestSchema,
  CorrelationRequestSchema,
  ForecastRequestSchema,
  MetricsRequestSchema,
  PerformanceRequestSchema,
  PlanRequestSchema,
  RecommendRequest,
  RecommendRequestSchema,
} from "../utils/validation";

const router: Router = Router();

/**
 * Translate a failure into a response.
 * Schema violations are 400s, analytics preconditions 422s, anything else a 500.
 */
function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof ZodError) {
    res.status(400).json({ error: "ValidationError", issues: error.issues });
    return;
  }
  if (isAnalyticsError(error)) {
    res.status(422).json({ error: error.kind, message: error.message, details: error.details });
    return;
  }
  console.error(`Error in ${context}:`, error);
  res.status(500).json({
    error: "Internal server error",
    message: error instanceof Error ? error.message : String(error),
  });
}

/**
 * Horizon of a recommendation request, from the target date when one is given
 */
function resolveHorizon(body: RecommendRequest, now: number): number {
  if (body.targetDate !== undefined) {
    return horizonFromTargetDate(body.targetDate, now);
  }
  return body.horizonYears ?? 0;
}

/**
 * POST /api/metrics
 * Risk/return metrics for one price series
 */
router.post("/metrics", (req: Request, res: Response) => {
  try {
    const { series } = MetricsRequestSchema.parse(req.body);
    const priceSeries = fromDatedPrices(series);

    res.json({
      ...computeMetrics(priceSeries),
      sequentialDrawdown: computeSequentialDrawdown(priceSeries),
    });
  } catch (error) {
    sendError(res, error, "metrics");
  }
});

/**
 * GET /api/recommend
 * Get information about the recommendation endpoint
 */
router.get("/recommend", (req: Request, res: Response) => {
  res.json({
    method: "POST",
    description: "Rank instruments for a goal horizon and plan contributions from the winner",
    endpoint: "/api/recommend",
    requiredFields: [
      "instruments (identifier -> [{ date, price }])",
      "goalAmount",
      "horizonYears or targetDate (at least one year out)",
      "zeroReturnFallback (optional)",
    ],
  });
});

/**
 * POST /api/recommend
 * Metrics for each instrument, ranking, and the contribution schedule for the winner
 */
router.post("/recommend", (req: Request, res: Response) => {
  try {
    const body = RecommendRequestSchema.parse(req.body);
    const horizonYears = resolveHorizon(body, Date.now());

    const instruments: Record<string, PriceSeries> = {};
    for (const [id, series] of Object.entries(body.instruments)) {
      instruments[id] = fromDatedPrices(series);
    }

    const planner = new InvestmentPlanner({
      instruments,
      goalAmount: body.goalAmount,
      horizonYears,
      zeroReturnFallback: body.zeroReturnFallback,
    });

    res.json({ ...planner.recommend(), targetDate: body.targetDate });
  } catch (error) {
    sendError(res, error, "recommendation");
  }
});

/**
 * POST /api/plan
 * Contribution schedule for a goal, horizon and assumed return
 */
router.post("/plan", (req: Request, res: Response) => {
  try {
    const { goalAmount, horizonYears, annualReturn, zeroReturnFallback } = PlanRequestSchema.parse(
      req.body
    );
    res.json(planContributions(goalAmount, horizonYears, annualReturn, { zeroReturnFallback }));
  } catch (error) {
    sendError(res, error, "contribution planning");
  }
});

/**
 * POST /api/forecast
 * Linear trend forecast; prices may be null for missing observations
 */
router.post("/forecast", (req: Request, res: Response) => {
  try {
    const { series, periods } = ForecastRequestSchema.parse(req.body);
    const points = fromDatedObservations(series);

    res.json({
      forecast: forecast(points, periods).map((p) => ({
        date: formatIsoDate(p.timestamp),
        price: p.price,
      })),
    });
  } catch (error) {
    sendError(res, error, "forecast");
  }
});

/**
 * POST /api/correlation
 * Correlation of two instruments' daily returns, overall and rolling
 */
router.post("/correlation", (req: Request, res: Response) => {
  try {
    const { a, b, window } = CorrelationRequestSchema.parse(req.body);
    const seriesA = fromDatedPrices(a);
    const seriesB = fromDatedPrices(b);

    res.json({
      correlation: returnCorrelation(seriesA, seriesB),
      rolling: rollingCorrelation(seriesA, seriesB, window).map((p) => ({
        date: formatIsoDate(p.timestamp),
        correlation: p.correlation,
      })),
    });
  } catch (error) {
    sendError(res, error, "correlation");
  }
});

/**
 * POST /api/correlation/matrix
 * Correlation of every pair of instruments over the dates they all share
 */
router.post("/correlation/matrix", (req: Request, res: Response) => {
  try {
    const { instruments } = CorrelationMatrixRequestSchema.parse(req.body);
    const series: Record<string, PriceSeries> = {};
    for (const [id, prices] of Object.entries(instruments)) {
      series[id] = fromDatedPrices(prices);
    }

    res.json(correlationMatrix(series));
  } catch (error) {
    sendError(res, error, "correlation matrix");
  }
});

/**
 * POST /api/performance
 * Daily-return analytics for one price series
 */
router.post("/performance", (req: Request, res: Response) => {
  try {
    const { series, window } = PerformanceRequestSchema.parse(req.body);
    const priceSeries = fromDatedPrices(series);

    res.json({
      annualizedVolatility: annualizedVolatility(priceSeries),
      cumulativeReturn: cumulativeReturn(priceSeries),
      normalized: normalizePerformance(priceSeries).map((p) => ({
        date: formatIsoDate(p.timestamp),
        value: p.value,
      })),
      rollingVolatility: rollingVolatility(priceSeries, window).map((p) => ({
        date: formatIsoDate(p.timestamp),
        volatility: p.volatility,
      })),
    });
  } catch (error) {
    sendError(res, error, "performance");
  }
});

/**
 * GET /api
 * API information endpoint
 */
router.get("/", (req: Request, res: Response) => {
  res.json({
    message: "Investment Goal Analytics API",
    version: "1.0.0",
    endpoints: {
      metrics: "POST /api/metrics - Risk/return metrics for a price series",
      recommend: "POST /api/recommend - Rank instruments and plan contributions",
      plan: "POST /api/plan - Contribution schedule for a goal",
      forecast: "POST /api/forecast - Linear trend forecast",
      correlation: "POST /api/correlation - Daily return correlation of two instruments",
      correlationMatrix: "POST /api/correlation/matrix - Pairwise correlation of many instruments",
      performance: "POST /api/performance - Volatility, cumulative return and normalized prices",
      health: "GET /api/health - Health check",
    },
  });
});

/**
 * GET /api/health
 * Health check endpoint
 */
router.get("/health", (req: Request, res: Response) => {
  res.json({ status: "ok", timestamp: new Date().toISOString() });
});

export default router;
