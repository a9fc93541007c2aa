import { ContributionSchedule, PlanOptions, scheduleFromYearly } from "../models/ContributionSchedule";
import {
  InvalidInputError,
  UndefinedExponentiationError,
  ZeroReturnUndefinedError,
} from "../models/errors";
import { requiredContribution } from "../utils/math";

/**
 * Back-solve the periodic contribution that grows to a target sum.
 * Formula: yearly = goal × r / ((1 + r)^years - 1); monthly = yearly / 12; weekly = yearly / 52
 *
 * @param goalAmount - Target sum, > 0
 * @param horizonYears - Years until the target date, > 0 (may be fractional)
 * @param annualReturn - Assumed growth per year as a decimal (0.07 for 7%)
 * @throws InvalidInputError for a non-positive goal or horizon, or a return below -100%
 * @throws ZeroReturnUndefinedError when annualReturn is 0 and no fallback is requested
 * @throws UndefinedExponentiationError when annualReturn is negative and the horizon is fractional
 *
 * @example
 * ```ts
 * planContributions(100000, 5, 0.07).yearly // ≈ 17389.07
 * ```
 */
export function planContributions(
  goalAmount: number,
  horizonYears: number,
  annualReturn: number,
  options: PlanOptions = {}
): ContributionSchedule {
  assertPositive("goalAmount", goalAmount);
  assertPositive("horizonYears", horizonYears);
  if (!Number.isFinite(annualReturn) || annualReturn < -1) {
    throw new InvalidInputError("annualReturn", "a finite number >= -1", annualReturn);
  }

  if (annualReturn === 0) {
    if (options.zeroReturnFallback) {
      return planWithoutGrowth(goalAmount, horizonYears);
    }
    throw new ZeroReturnUndefinedError();
  }

  if (annualReturn < 0 && !Number.isInteger(horizonYears)) {
    throw new UndefinedExponentiationError(annualReturn, horizonYears);
  }

  return scheduleFromYearly(requiredContribution(goalAmount, annualReturn, horizonYears));
}

/**
 * Contributions with no growth: the goal split evenly over the horizon.
 */
export function planWithoutGrowth(goalAmount: number, horizonYears: number): ContributionSchedule {
  assertPositive("goalAmount", goalAmount);
  assertPositive("horizonYears", horizonYears);
  return scheduleFromYearly(goalAmount / horizonYears);
}

function assertPositive(input: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidInputError(input, "a finite number > 0", value);
  }
}
