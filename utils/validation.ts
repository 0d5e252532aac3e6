import { PREFERENCE_CHOICES, type PreferenceChoice } from "../schemas/tripRequest";
import { addDays, daysBetween, parseIsoDate, toLocalIsoDate } from "./dates";
import { InputValidationError } from "./errors";

export interface ValidatedDateRange {
  startDate: Date;
  endDate: Date;
  durationDays: number;
}

const FORECAST_WARNING_DAYS = 5;
const LONG_TRIP_DAYS = 30;

/** Today's local calendar day as a UTC midnight, comparable with parsed ISO dates. */
export function startOfToday(now: Date): Date {
  // toLocalIsoDate always yields a valid YYYY-MM-DD
  return parseIsoDate(toLocalIsoDate(now)) ?? now;
}

/**
 * Parses both dates and checks their order.
 *
 * @throws InputValidationError for malformed dates or an end before the start.
 */
export function validateDateRange(
  startDateStr: string,
  endDateStr: string,
  now: Date = new Date()
): ValidatedDateRange {
  const startDate = parseIsoDate(startDateStr);
  if (!startDate) {
    throw new InputValidationError(
      `Invalid date format: "${startDateStr}" does not match YYYY-MM-DD`
    );
  }
  const endDate = parseIsoDate(endDateStr);
  if (!endDate) {
    throw new InputValidationError(
      `Invalid date format: "${endDateStr}" does not match YYYY-MM-DD`
    );
  }
  if (endDate < startDate) {
    throw new InputValidationError("End date must be after start date");
  }

  if (startDate > addDays(startOfToday(now), FORECAST_WARNING_DAYS)) {
    console.warn(
      "[PLANNER] Weather forecast may not be available for dates more than 5 days in the future"
    );
  }

  const durationDays = daysBetween(startDate, endDate) + 1;
  if (durationDays > LONG_TRIP_DAYS) {
    console.warn("[PLANNER] Trip duration exceeds 30 days - this may affect performance");
  }

  return { startDate, endDate, durationDays };
}

/**
 * Checks a single `YYYY-MM-DD` answer. Dates in the past or more than a year
 * ahead are accepted with a warning.
 */
export function isValidDateInput(value: string, now: Date = new Date()): boolean {
  const date = parseIsoDate(value.trim());
  if (!date) {
    return false;
  }
  const today = startOfToday(now);
  if (date < addDays(today, -1)) {
    console.warn("[CLI] Date is in the past");
  }
  if (date > addDays(today, 365)) {
    console.warn("[CLI] Date is more than a year in the future");
  }
  return true;
}

export function isPreferenceChoice(value: string): value is PreferenceChoice {
  return PREFERENCE_CHOICES.some((choice) => choice === value);
}
