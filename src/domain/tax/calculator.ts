import Decimal from "decimal.js";

import type { DateInput } from "../../shared/dates.js";
import { roundCurrency, toMoney, type Money, type MoneyInput } from "../../shared/money.js";
import { getDefaultRegistry, type RulesetRegistry } from "../rulesets/registry.js";
import type { IncomeTaxBand, Ruleset } from "../rulesets/types.js";
import type { LiabilityBreakdown } from "./types.js";

const WEEKS_PER_YEAR = 52;

function computeBandTax(taxableBase: Money, bands: readonly IncomeTaxBand[]): Money {
  let total = new Decimal(0);
  let lowerBound = new Decimal(0);

  for (const band of bands) {
    if (taxableBase.lte(lowerBound)) {
      break;
    }

    const upperBound = band.upperBound ?? taxableBase;
    const taxableInBand = Decimal.min(taxableBase, upperBound).minus(lowerBound);
    total = total.plus(taxableInBand.times(band.rate));
    lowerBound = upperBound;
  }

  return roundCurrency(total);
}

export function computeIncomeTax(profit: MoneyInput, ruleset: Ruleset): Money {
  const taxableBase = Decimal.max(0, toMoney(profit).minus(ruleset.personalAllowance));
  return computeBandTax(taxableBase, ruleset.incomeTax.bands);
}

/** Step function: the full weekly rate for the year once profit reaches the threshold. */
export function computeFlatContribution(profit: MoneyInput, ruleset: Ruleset): Money {
  const amount = toMoney(profit);
  const rules = ruleset.flatContribution;

  if (amount.lte(0) || amount.lt(rules.threshold)) {
    return roundCurrency(0);
  }

  return roundCurrency(rules.weeklyRate.times(WEEKS_PER_YEAR));
}

export function computeProfitContribution(profit: MoneyInput, ruleset: Ruleset): Money {
  const amount = toMoney(profit);
  const rules = ruleset.profitContribution;

  if (amount.lte(rules.lowerThreshold)) {
    return roundCurrency(0);
  }

  const mainPortion = Decimal.min(amount, rules.upperThreshold).minus(rules.lowerThreshold).times(rules.mainRate);
  const higherPortion = Decimal.max(0, amount.minus(rules.upperThreshold)).times(rules.higherRate);

  return roundCurrency(mainPortion.plus(higherPortion));
}

export function calculateLiability(profit: MoneyInput, ruleset: Ruleset): LiabilityBreakdown {
  const netProfit = toMoney(profit);
  const incomeTax = computeIncomeTax(netProfit, ruleset);
  const flatContribution = computeFlatContribution(netProfit, ruleset);
  const profitContribution = computeProfitContribution(netProfit, ruleset);

  return {
    fiscalYear: ruleset.fiscalYear,
    rulesetVersion: ruleset.version,
    netProfit,
    incomeTax,
    flatContribution,
    profitContribution,
    total: incomeTax.plus(flatContribution).plus(profitContribution)
  };
}

/** Liability for a profit figure under the ruleset of the fiscal year containing `date`. */
export function totalLiability(
  profit: MoneyInput,
  date: DateInput,
  registry: RulesetRegistry = getDefaultRegistry()
): LiabilityBreakdown {
  return calculateLiability(profit, registry.lookupByDate(date));
}

export function taxToSetAside(amount: MoneyInput, setAsidePercentage: MoneyInput): Money {
  const value = toMoney(amount);
  const percentage = toMoney(setAsidePercentage);

  if (value.lte(0) || percentage.lte(0)) {
    return roundCurrency(0);
  }

  return roundCurrency(value.times(percentage).div(100));
}

export function vatThresholdProximity(turnover: MoneyInput, ruleset: Ruleset): Decimal {
  const threshold = ruleset.vat.threshold;
  if (threshold.lte(0)) {
    return roundCurrency(0);
  }

  return roundCurrency(toMoney(turnover).div(threshold).times(100));
}
