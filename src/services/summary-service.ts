import type Decimal from "decimal.js";

import { fiscalYearBounds, registrationDeadline } from "../domain/calendar/fiscal-year.js";
import type { FiscalYearLabel } from "../domain/calendar/types.js";
import { getDefaultRegistry, type RulesetRegistry } from "../domain/rulesets/registry.js";
import { taxToSetAside, totalLiability, vatThresholdProximity } from "../domain/tax/calculator.js";
import { recommendSavingsRate } from "../domain/tax/recommendation.js";
import type { LiabilityBreakdown, RecommendationResult } from "../domain/tax/types.js";
import { logger } from "../infrastructure/logger.js";
import type { IsoDate } from "../shared/dates.js";
import { sumMoney, toMoney, type Money } from "../shared/money.js";
import { fiscalYearSummaryInputSchema, parseInput, type FiscalYearSummaryInput } from "./schemas.js";
import { entriesInFiscalYear, sumAmounts } from "./transactions.js";

export interface FiscalYearSummary {
  fiscalYear: FiscalYearLabel;
  fiscalYearStart: IsoDate;
  fiscalYearEnd: IsoDate;
  totalIncome: Money;
  totalExpenses: Money;
  netProfit: Money;
  liability: LiabilityBreakdown;
  /** Set-aside owed on income at the user's chosen percentage. */
  taxToSetAside: Money;
  actualTaxSaved: Money;
  registrationDeadline: IsoDate | null;
  /** Income as a percentage of the VAT threshold. */
  vatThresholdProximity: Decimal;
  recommendation: RecommendationResult;
  setAsideBelowRecommendation: boolean;
}

export function summarizeFiscalYear(
  input: FiscalYearSummaryInput,
  registry: RulesetRegistry = getDefaultRegistry()
): FiscalYearSummary {
  const parsed = parseInput(fiscalYearSummaryInputSchema, input);
  const { calendar } = registry;
  const bounds = fiscalYearBounds(parsed.fiscalYear, calendar);
  const ruleset = registry.lookupByLabel(parsed.fiscalYear);

  const incomes = entriesInFiscalYear(parsed.incomes, parsed.fiscalYear, calendar);
  const expenses = entriesInFiscalYear(parsed.expenses, parsed.fiscalYear, calendar);
  const totalIncome = sumAmounts(incomes);
  const totalExpenses = sumAmounts(expenses);
  const netProfit = totalIncome.minus(totalExpenses);

  const [earliestIncomeDate] = incomes.map((income) => income.date).sort();
  const calculationDate = earliestIncomeDate ?? bounds.start;
  const liability = totalLiability(netProfit, calculationDate, registry);
  const recommendation = recommendSavingsRate(netProfit, calculationDate, registry);
  const setAsidePercentage = toMoney(parsed.setAsidePercentage);

  logger.debug(
    {
      fiscalYear: parsed.fiscalYear,
      rulesetVersion: liability.rulesetVersion,
      incomeCount: incomes.length,
      expenseCount: expenses.length
    },
    "fiscal year summarized"
  );

  return {
    fiscalYear: parsed.fiscalYear,
    fiscalYearStart: bounds.start,
    fiscalYearEnd: bounds.end,
    totalIncome,
    totalExpenses,
    netProfit,
    liability,
    taxToSetAside: taxToSetAside(totalIncome, setAsidePercentage),
    actualTaxSaved: sumMoney(incomes.map((income) => toMoney(income.taxSaved ?? 0))),
    registrationDeadline: parsed.tradingStartDate ? registrationDeadline(parsed.tradingStartDate, calendar) : null,
    vatThresholdProximity: vatThresholdProximity(totalIncome, ruleset),
    recommendation,
    setAsideBelowRecommendation: setAsidePercentage.lt(recommendation.percentage)
  };
}
