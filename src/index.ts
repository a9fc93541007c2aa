export * from "./models/errors";
export * from "./models/PriceSeries";
export * from "./models/Metrics";
export * from "./models/ContributionSchedule";
export * from "./models/Forecast";
export * from "./models/PlanningResult";
export {
  annualCloses,
  annualReturns,
  computeMetrics,
  computeSequentialDrawdown,
  computeWholeSeriesDrawdown,
} from "./engine/metrics";
export type { AnnualClose } from "./engine/metrics";
export { rank, rankAll, scoreCandidate } from "./engine/ranker";
export { forecast } from "./engine/forecaster";
export * from "./engine/returns";
export { planContributions, planWithoutGrowth } from "./planner/contributionPlanner";
export { InvestmentPlanner } from "./planner/investmentPlanner";
export type { PlanningContext } from "./planner/investmentPlanner";
export * from "./report/reportSink";
export { horizonFromTargetDate, horizonYearsUntil } from "./utils/time";
