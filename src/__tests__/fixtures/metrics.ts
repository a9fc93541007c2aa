import { Candidate, Metrics } from '../../models/Metrics';

export const balancedMetrics: Metrics = {
  avgAnnualReturn: 0.1,
  volatility: 0.2,
  maxDrawdown: -0.25,
  latestPrice: 4500,
};

export const growthMetrics: Metrics = {
  avgAnnualReturn: 0.18,
  volatility: 0.3,
  maxDrawdown: -0.5,
  latestPrice: 15000,
};

export const steadyMetrics: Metrics = {
  avgAnnualReturn: 0.06,
  volatility: 0.1,
  maxDrawdown: -0.15,
  latestPrice: 36000,
};

export const zeroVolatilityMetrics: Metrics = {
  ...balancedMetrics,
  volatility: 0,
};

export const zeroDrawdownMetrics: Metrics = {
  ...balancedMetrics,
  maxDrawdown: 0,
};

export const indexCandidates: Candidate[] = [
  { id: 'S&P 500', metrics: balancedMetrics },
  { id: 'Nasdaq', metrics: growthMetrics },
  { id: 'Dow Jones', metrics: steadyMetrics },
];
