import { PriceSeries } from "../models/PriceSeries";
import { Metrics, MetricsOptions, toCandidates } from "../models/Metrics";
import { ForecastPoint } from "../models/Forecast";
import { InvestmentReport } from "../models/PlanningResult";
import { computeMetrics } from "../engine/metrics";
import { rankAll } from "../engine/ranker";
import { forecast } from "../engine/forecaster";
import { planContributions } from "./contributionPlanner";
import { DEFAULT_FORECAST_PERIODS } from "../utils/constants";

/**
 * Planning context containing all inputs for a recommendation.
 *
 * @property instruments - One price series per candidate instrument, keyed by identifier
 * @property goalAmount - Target sum to reach
 * @property horizonYears - Years until the target date
 * @property zeroReturnFallback - Plan a winner with exactly 0% average return as goal / years
 */
export interface PlanningContext {
  instruments: Record<string, PriceSeries>;
  goalAmount: number;
  horizonYears: number;
  zeroReturnFallback?: boolean;
  metricsOptions?: MetricsOptions;
}

/**
 * Runs the analytics pipeline: metrics per instrument, ranking against the
 * horizon, then the contribution schedule for the winner's average return.
 *
 * Metrics are computed once per planner; build a new planner when a series changes.
 */
export class InvestmentPlanner {
  private context: PlanningContext;
  private metricsCache: Record<string, Metrics> | null = null;

  constructor(context: PlanningContext) {
    this.context = context;
  }

  /**
   * Metrics for every instrument, keyed by identifier
   */
  analyze(): Record<string, Metrics> {
    if (this.metricsCache === null) {
      const metricsById: Record<string, Metrics> = {};
      for (const [id, series] of Object.entries(this.context.instruments)) {
        metricsById[id] = computeMetrics(series, this.context.metricsOptions);
      }
      this.metricsCache = metricsById;
    }
    return this.metricsCache;
  }

  /**
   * Rank instruments and plan contributions from the winner
   */
  recommend(): InvestmentReport {
    const { goalAmount, horizonYears, zeroReturnFallback } = this.context;
    const metricsById = this.analyze();

    const ranking = rankAll(toCandidates(metricsById), horizonYears);
    const recommendation = ranking[0];

    const schedule = planContributions(
      goalAmount,
      horizonYears,
      recommendation.metrics.avgAnnualReturn,
      { zeroReturnFallback }
    );

    return {
      goalAmount,
      horizonYears,
      recommendation,
      ranking,
      schedule,
      metricsById,
    };
  }

  /**
   * Linear trend forecast for every instrument
   */
  forecastAll(periods: number = DEFAULT_FORECAST_PERIODS): Record<string, ForecastPoint[]> {
    const forecasts: Record<string, ForecastPoint[]> = {};
    for (const [id, series] of Object.entries(this.context.instruments)) {
      forecasts[id] = forecast(series, periods);
    }
    return forecasts;
  }
}
