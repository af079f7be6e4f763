import { format, isValid, parseISO, startOfDay } from "date-fns";

import { validationError } from "./errors.js";

/** Calendar date in `YYYY-MM-DD` form. */
export type IsoDate = string;
export type DateInput = IsoDate | Date;

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// All arithmetic runs on local-midnight Dates so that the host time zone never shifts a day.
export function parseCalendarDate(value: DateInput): Date {
  if (value instanceof Date) {
    if (!isValid(value)) {
      throw validationError("Invalid date value.");
    }

    return startOfDay(value);
  }

  const parsed = parseISO(value);
  if (!ISO_DATE_PATTERN.test(value) || !isValid(parsed) || format(parsed, "yyyy-MM-dd") !== value) {
    throw validationError(`Invalid date value: ${value}`, { value });
  }

  return parsed;
}

export function formatCalendarDate(value: Date): IsoDate {
  return format(value, "yyyy-MM-dd");
}

export function calendarDate(year: number, month: number, day: number): Date {
  return new Date(year, month - 1, day);
}
