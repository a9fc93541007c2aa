import { ContributionSchedule } from "./ContributionSchedule";
import { Metrics, Recommendation, ScoredCandidate } from "./Metrics";

/**
 * Planning result data structures
 */

export interface InvestmentReport {
  goalAmount: number;
  horizonYears: number;
  recommendation: Recommendation;
  ranking: ScoredCandidate[]; // best first
  schedule: ContributionSchedule;
  metricsById: Record<string, Metrics>;
  targetDate?: string; // ISO date, when the horizon was derived from one
}
