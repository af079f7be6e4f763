import { addYears, isAfter, subDays } from "date-fns";

import {
  calendarDate,
  formatCalendarDate,
  parseCalendarDate,
  type DateInput,
  type IsoDate
} from "../../shared/dates.js";
import { configurationError } from "../../shared/errors.js";
import { UK_FISCAL_CALENDAR, type DateRange, type FiscalCalendar, type FiscalYearLabel } from "./types.js";

const FISCAL_YEAR_LABEL_PATTERN = /^(\d{4})-(\d{2})$/;

function assertMonthDay(month: number, day: number, field: string): void {
  if (!Number.isInteger(month) || month < 1 || month > 12 || !Number.isInteger(day) || day < 1 || day > 28) {
    throw configurationError(`Fiscal calendar ${field} must be a month 1-12 and a day 1-28.`, {
      field,
      month,
      day
    });
  }
}

export function assertFiscalCalendar(calendar: FiscalCalendar): void {
  assertMonthDay(calendar.startMonth, calendar.startDay, "start");
  assertMonthDay(calendar.registrationDeadlineMonth, calendar.registrationDeadlineDay, "registration deadline");
}

export function formatFiscalYearLabel(startYear: number): FiscalYearLabel {
  return `${startYear}-${String((startYear + 1) % 100).padStart(2, "0")}`;
}

export function isFiscalYearLabel(value: string): boolean {
  return FISCAL_YEAR_LABEL_PATTERN.test(value);
}

/** Returns the start year encoded in a fiscal-year label. */
export function parseFiscalYearLabel(label: FiscalYearLabel): number {
  const match = FISCAL_YEAR_LABEL_PATTERN.exec(label);
  const startYear = match ? Number.parseInt(match[1] ?? "", 10) : Number.NaN;

  if (!match || Number.isNaN(startYear) || formatFiscalYearLabel(startYear) !== label) {
    throw configurationError(`Invalid fiscal year label: ${label}`, { label });
  }

  return startYear;
}

export function fiscalYearOf(date: DateInput, calendar: FiscalCalendar = UK_FISCAL_CALENDAR): FiscalYearLabel {
  assertFiscalCalendar(calendar);
  const value = parseCalendarDate(date);
  const month = value.getMonth() + 1;
  const beforeStart =
    month < calendar.startMonth || (month === calendar.startMonth && value.getDate() < calendar.startDay);

  return formatFiscalYearLabel(beforeStart ? value.getFullYear() - 1 : value.getFullYear());
}

export function fiscalYearBounds(label: FiscalYearLabel, calendar: FiscalCalendar = UK_FISCAL_CALENDAR): DateRange {
  assertFiscalCalendar(calendar);
  const startYear = parseFiscalYearLabel(label);
  const start = calendarDate(startYear, calendar.startMonth, calendar.startDay);
  const nextStart = calendarDate(startYear + 1, calendar.startMonth, calendar.startDay);

  return {
    start: formatCalendarDate(start),
    end: formatCalendarDate(subDays(nextStart, 1))
  };
}

export function currentFiscalYear(
  today: DateInput = new Date(),
  calendar: FiscalCalendar = UK_FISCAL_CALENDAR
): FiscalYearLabel {
  return fiscalYearOf(today, calendar);
}

/**
 * Deadline to register for self assessment: the configured day/month following the end
 * of the fiscal year in which trading started. When the fiscal year ends after that day
 * in its own calendar year, the deadline moves to the next year.
 */
export function registrationDeadline(
  tradingStartDate: DateInput,
  calendar: FiscalCalendar = UK_FISCAL_CALENDAR
): IsoDate {
  const { end } = fiscalYearBounds(fiscalYearOf(tradingStartDate, calendar), calendar);
  const fiscalYearEnd = parseCalendarDate(end);
  const sameYearDeadline = calendarDate(
    fiscalYearEnd.getFullYear(),
    calendar.registrationDeadlineMonth,
    calendar.registrationDeadlineDay
  );

  return formatCalendarDate(isAfter(fiscalYearEnd, sameYearDeadline) ? addYears(sameYearDeadline, 1) : sameYearDeadline);
}
