import { Candidate, Metrics, Recommendation, ScoredCandidate } from "../models/Metrics";
import {
  DivisionUndefinedError,
  EmptyCandidateSetError,
  InvalidInputError,
} from "../models/errors";
import {
  DRAWDOWN_WEIGHT,
  LONG_HORIZON_YEARS,
  RETURN_WEIGHT,
  SHORT_HORIZON_PENALTY,
  VOLATILITY_WEIGHT,
} from "../utils/constants";

/**
 * Score one instrument's metrics against a goal horizon.
 * Formula: (0.4·return + 0.3/|volatility| + 0.3/|drawdown|) × (1 if horizon > 10 else 0.8)
 *
 * @param subject - Name used in errors
 * @throws DivisionUndefinedError when volatility or maxDrawdown is zero, or so
 * close to it that its reciprocal overflows
 */
export function scoreCandidate(metrics: Metrics, horizonYears: number, subject = "candidate"): number {
  assertFinite(`${subject}.avgAnnualReturn`, metrics.avgAnnualReturn);
  assertFinite(`${subject}.volatility`, metrics.volatility);
  assertFinite(`${subject}.maxDrawdown`, metrics.maxDrawdown);
  assertFinite("horizonYears", horizonYears);

  if (metrics.volatility === 0) {
    throw new DivisionUndefinedError(subject, "volatility");
  }
  if (metrics.maxDrawdown === 0) {
    throw new DivisionUndefinedError(subject, "maxDrawdown");
  }

  const inverseVolatility = 1 / Math.abs(metrics.volatility);
  if (!Number.isFinite(inverseVolatility)) {
    throw new DivisionUndefinedError(subject, "volatility");
  }
  const inverseDrawdown = 1 / Math.abs(metrics.maxDrawdown);
  if (!Number.isFinite(inverseDrawdown)) {
    throw new DivisionUndefinedError(subject, "maxDrawdown");
  }

  const horizonFactor = horizonYears > LONG_HORIZON_YEARS ? 1 : SHORT_HORIZON_PENALTY;
  const score =
    (RETURN_WEIGHT * metrics.avgAnnualReturn +
      VOLATILITY_WEIGHT * inverseVolatility +
      DRAWDOWN_WEIGHT * inverseDrawdown) *
    horizonFactor;
  if (!Number.isFinite(score)) {
    throw new DivisionUndefinedError(subject, "score");
  }
  return score;
}

/**
 * Score every candidate and order them best first.
 * Equal scores are ordered by identifier (code-unit order) so results are deterministic.
 */
export function rankAll(candidates: ReadonlyArray<Candidate>, horizonYears: number): ScoredCandidate[] {
  if (candidates.length === 0) {
    throw new EmptyCandidateSetError();
  }

  const seen = new Set<string>();
  for (const candidate of candidates) {
    if (seen.has(candidate.id)) {
      throw new InvalidInputError("candidates", "unique identifiers", candidate.id);
    }
    seen.add(candidate.id);
  }

  return candidates
    .map((candidate) => ({
      id: candidate.id,
      metrics: candidate.metrics,
      score: scoreCandidate(candidate.metrics, horizonYears, candidate.id),
    }))
    .sort(compareScored);
}

/**
 * Pick the best candidate for a goal horizon.
 *
 * @throws EmptyCandidateSetError when no candidates are given
 * @throws DivisionUndefinedError when any candidate has zero volatility or drawdown
 */
export function rank(candidates: ReadonlyArray<Candidate>, horizonYears: number): Recommendation {
  const [best] = rankAll(candidates, horizonYears);
  return best;
}

function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

function assertFinite(input: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(input, "a finite number", value);
  }
}
