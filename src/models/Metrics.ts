/**
 * Instrument metrics data structures
 */

export interface Metrics {
  avgAnnualReturn: number; // decimal, may be negative (0.07 for 7%)
  volatility: number; // sample std of annual returns, >= 0
  maxDrawdown: number; // in [-1, 0]
  latestPrice: number;
}

export type DrawdownMode = "wholeSeries" | "sequential";

export interface MetricsOptions {
  drawdown?: DrawdownMode;
}

export interface Candidate {
  id: string;
  metrics: Metrics;
}

export interface ScoredCandidate extends Candidate {
  score: number;
}

/**
 * The ranking winner. Produced once per ranking call.
 */
export type Recommendation = ScoredCandidate;

/**
 * Turn an id -> metrics map into candidates, ordered by id
 */
export function toCandidates(metricsById: Record<string, Metrics>): Candidate[] {
  return Object.keys(metricsById)
    .sort()
    .map((id) => ({ id, metrics: metricsById[id] }));
}
