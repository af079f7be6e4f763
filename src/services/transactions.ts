import { fiscalYearOf } from "../domain/calendar/fiscal-year.js";
import { periodContains } from "../domain/calendar/assessment-period.js";
import type { AssessmentPeriod, FiscalCalendar, FiscalYearLabel } from "../domain/calendar/types.js";
import { sumMoney, toMoney, type Money, type MoneyInput } from "../shared/money.js";

interface DatedAmount {
  date: string;
  amount: MoneyInput;
}

export function entriesInFiscalYear<T extends DatedAmount>(
  entries: readonly T[],
  fiscalYear: FiscalYearLabel,
  calendar: FiscalCalendar
): T[] {
  return entries.filter((entry) => fiscalYearOf(entry.date, calendar) === fiscalYear);
}

export function entriesInPeriod<T extends DatedAmount>(entries: readonly T[], period: AssessmentPeriod): T[] {
  return entries.filter((entry) => periodContains(period, entry.date));
}

export function sumAmounts(entries: readonly DatedAmount[]): Money {
  return sumMoney(entries.map((entry) => toMoney(entry.amount)));
}
