/**
 * Contribution planning data structures
 */

export interface ContributionSchedule {
  yearly: number;
  monthly: number;
  weekly: number;
}

export interface PlanOptions {
  /**
   * When annualReturn is exactly 0, use yearly = goal / years instead of
   * failing with ZeroReturnUndefined.
   */
  zeroReturnFallback?: boolean;
}

/**
 * Derive the monthly and weekly amounts from a yearly contribution
 */
export function scheduleFromYearly(yearly: number): ContributionSchedule {
  return {
    yearly,
    monthly: yearly / 12,
    weekly: yearly / 52,
  };
}
