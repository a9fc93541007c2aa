/**
 * Calendar utilities. All calendar arithmetic is done in UTC.
 */

import { InvalidInputError } from "../models/errors";
import { DAYS_PER_YEAR, MIN_HORIZON_YEARS } from "./constants";

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Calendar year (UTC) of an epoch timestamp
 */
export function utcYear(timestamp: number): number {
  return new Date(timestamp).getUTCFullYear();
}

/**
 * Adds whole days to a timestamp
 */
export function addDays(timestamp: number, days: number): number {
  return timestamp + days * MS_PER_DAY;
}

const ISO_CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parses an ISO calendar date ("2024-01-31") to UTC midnight in epoch milliseconds.
 * Impossible dates such as "2021-02-30" are rejected rather than rolled over.
 *
 * @param value - Date string
 * @param input - Name of the input being parsed, used in the error
 * @throws InvalidInputError when the string is not a valid YYYY-MM-DD date
 */
export function parseIsoDate(value: string, input: string): number {
  const timestamp = ISO_CALENDAR_DATE.test(value) ? Date.parse(value) : NaN;
  if (Number.isNaN(timestamp) || formatIsoDate(timestamp) !== value) {
    throw new InvalidInputError(input, "an ISO date", value);
  }
  return timestamp;
}

/**
 * Formats a timestamp as an ISO calendar date (YYYY-MM-DD)
 */
export function formatIsoDate(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/**
 * Years from asOf until targetDate, as elapsed days / 365.25.
 * Negative when the target is in the past.
 */
export function horizonYearsUntil(targetDate: number, asOf: number): number {
  return (targetDate - asOf) / MS_PER_DAY / DAYS_PER_YEAR;
}

/**
 * Horizon for a goal target date, which must be at least MIN_HORIZON_YEARS after asOf.
 *
 * @throws InvalidInputError for an unparseable or too-near target date
 */
export function horizonFromTargetDate(targetDate: string, asOf: number): number {
  const horizonYears = horizonYearsUntil(parseIsoDate(targetDate, "targetDate"), asOf);
  if (horizonYears < MIN_HORIZON_YEARS) {
    throw new InvalidInputError(
      "targetDate",
      `a date at least ${MIN_HORIZON_YEARS} year(s) after ${formatIsoDate(asOf)}`,
      targetDate
    );
  }
  return horizonYears;
}
