import { assessmentPeriod, assessmentPeriodsBetween } from "../domain/calendar/assessment-period.js";
import type { AssessmentPeriod } from "../domain/calendar/types.js";
import type { Money } from "../shared/money.js";
import {
  assessmentHistoryInputSchema,
  assessmentReportInputSchema,
  parseInput,
  type AssessmentHistoryInput,
  type AssessmentReportInput,
  type ExpenseEntry,
  type IncomeEntry
} from "./schemas.js";
import { entriesInPeriod, sumAmounts } from "./transactions.js";

export interface AssessmentReport {
  period: AssessmentPeriod;
  anchorDay: number;
  totalIncome: Money;
  totalExpenses: Money;
  netProfit: Money;
  incomeCount: number;
  expenseCount: number;
}

function reportForPeriod(
  period: AssessmentPeriod,
  anchorDay: number,
  incomes: readonly IncomeEntry[],
  expenses: readonly ExpenseEntry[]
): AssessmentReport {
  const periodIncomes = entriesInPeriod(incomes, period);
  const periodExpenses = entriesInPeriod(expenses, period);
  const totalIncome = sumAmounts(periodIncomes);
  const totalExpenses = sumAmounts(periodExpenses);

  return {
    period,
    anchorDay,
    totalIncome,
    totalExpenses,
    netProfit: totalIncome.minus(totalExpenses),
    incomeCount: periodIncomes.length,
    expenseCount: periodExpenses.length
  };
}

/** Cash-basis totals for the assessment period containing the reference date. */
export function buildAssessmentReport(input: AssessmentReportInput): AssessmentReport {
  const parsed = parseInput(assessmentReportInputSchema, input);
  const period = assessmentPeriod(parsed.referenceDate, parsed.anchorDay);

  return reportForPeriod(period, parsed.anchorDay, parsed.incomes, parsed.expenses);
}

/** One report per assessment period from `from` to `to`, oldest first. */
export function buildAssessmentHistory(input: AssessmentHistoryInput): AssessmentReport[] {
  const parsed = parseInput(assessmentHistoryInputSchema, input);

  return assessmentPeriodsBetween(parsed.from, parsed.to, parsed.anchorDay).map((period) =>
    reportForPeriod(period, parsed.anchorDay, parsed.incomes, parsed.expenses)
  );
}
