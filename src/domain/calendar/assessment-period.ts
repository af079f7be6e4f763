import { addMonths, isAfter, isWithinInterval, subDays, subMonths } from "date-fns";

import { calendarDate, formatCalendarDate, parseCalendarDate, type DateInput } from "../../shared/dates.js";
import { configurationError, validationError } from "../../shared/errors.js";
import type { AssessmentPeriod } from "./types.js";

export const MIN_ANCHOR_DAY = 1;
// Every month has a 28th, so periods stay well-defined through February.
export const MAX_ANCHOR_DAY = 28;

export function assertAnchorDay(anchorDay: number): void {
  if (!Number.isInteger(anchorDay) || anchorDay < MIN_ANCHOR_DAY || anchorDay > MAX_ANCHOR_DAY) {
    throw configurationError(
      `Assessment anchor day must be an integer between ${MIN_ANCHOR_DAY} and ${MAX_ANCHOR_DAY}, received ${anchorDay}.`,
      { anchorDay }
    );
  }
}

function periodStartingOn(start: Date): AssessmentPeriod {
  return {
    start: formatCalendarDate(start),
    end: formatCalendarDate(subDays(addMonths(start, 1), 1))
  };
}

export function assessmentPeriod(referenceDate: DateInput, anchorDay: number): AssessmentPeriod {
  assertAnchorDay(anchorDay);
  const reference = parseCalendarDate(referenceDate);
  const anchoredInMonth = calendarDate(reference.getFullYear(), reference.getMonth() + 1, anchorDay);

  return periodStartingOn(reference.getDate() >= anchorDay ? anchoredInMonth : subMonths(anchoredInMonth, 1));
}

export function nextAssessmentPeriod(currentStart: DateInput, anchorDay: number): AssessmentPeriod {
  assertAnchorDay(anchorDay);
  const current = parseCalendarDate(currentStart);
  const anchoredInMonth = calendarDate(current.getFullYear(), current.getMonth() + 1, anchorDay);

  return assessmentPeriod(addMonths(anchoredInMonth, 1), anchorDay);
}

/** Consecutive periods from the one containing `from` through the one containing `to`. */
export function assessmentPeriodsBetween(from: DateInput, to: DateInput, anchorDay: number): AssessmentPeriod[] {
  const first = parseCalendarDate(from);
  const last = parseCalendarDate(to);
  if (isAfter(first, last)) {
    throw validationError("Assessment range start must not be after its end.", {
      from: formatCalendarDate(first),
      to: formatCalendarDate(last)
    });
  }

  let current = assessmentPeriod(first, anchorDay);
  const periods = [current];
  while (isAfter(last, parseCalendarDate(current.end))) {
    current = nextAssessmentPeriod(current.start, anchorDay);
    periods.push(current);
  }

  return periods;
}

export function periodContains(period: AssessmentPeriod, date: DateInput): boolean {
  return isWithinInterval(parseCalendarDate(date), {
    start: parseCalendarDate(period.start),
    end: parseCalendarDate(period.end)
  });
}
