import type { IsoDate } from "../../shared/dates.js";

/** `"{start}-{two-digit end}"`, e.g. `"2024-25"`. */
export type FiscalYearLabel = string;

export interface FiscalCalendar {
  startMonth: number;
  startDay: number;
  registrationDeadlineMonth: number;
  registrationDeadlineDay: number;
}

export interface DateRange {
  start: IsoDate;
  end: IsoDate;
}

export type AssessmentPeriod = DateRange;

// UK self-assessment: the tax year starts 6 April, registration is due by 5 October after it ends.
export const UK_FISCAL_CALENDAR: Readonly<FiscalCalendar> = Object.freeze({
  startMonth: 4,
  startDay: 6,
  registrationDeadlineMonth: 10,
  registrationDeadlineDay: 5
});
