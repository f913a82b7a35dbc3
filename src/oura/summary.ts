import { InvalidDateRangeError } from "../errors.js";
import { addDays, isIsoDate } from "../utils/dates.js";

export interface DateWindow {
  startDate: string;
  endDate: string;
}

/**
 * Resolve an optional start/end pair into the `start_date`/`end_date` query
 * values. `end` falls back to `today`, `start` to the day before `end`.
 */
export function resolveDateWindow(
  start: string | undefined,
  end: string | undefined,
  today: string
): DateWindow {
  if (end && !isIsoDate(end)) {
    throw new InvalidDateRangeError(`Invalid end date "${end}". Use YYYY-MM-DD.`, start, end);
  }
  if (start && !isIsoDate(start)) {
    throw new InvalidDateRangeError(`Invalid start date "${start}". Use YYYY-MM-DD.`, start, end);
  }

  const endDate = end || today;
  const startDate = start || addDays(endDate, -1);

  if (startDate > endDate) {
    throw new InvalidDateRangeError(
      `Start date must be before end date. Provided start: ${start}, end: ${end}`,
      start,
      end
    );
  }

  return { startDate, endDate };
}
