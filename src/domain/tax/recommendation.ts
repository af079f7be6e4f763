import Decimal from "decimal.js";

import type { DateInput } from "../../shared/dates.js";
import { configurationError } from "../../shared/errors.js";
import { clamp, roundCurrency, toMoney, type MoneyInput } from "../../shared/money.js";
import { getDefaultRegistry, type RulesetRegistry } from "../rulesets/registry.js";
import { totalLiability } from "./calculator.js";
import type { ProfitBand, RecommendationResult } from "./types.js";

export const DEFAULT_SAVINGS_PERCENTAGE = 20;
export const SAFETY_BUFFER_POINTS = 5;
export const PERCENTAGE_STEP = 5;
export const MIN_SAVINGS_PERCENTAGE = 15;
export const MAX_SAVINGS_PERCENTAGE = 50;

const NO_PROFIT_REASON = "No profit projected yet, so the standard set-aside applies.";

// Ascending by lower bound; the last band is open-ended.
export const PROFIT_BANDS: readonly ProfitBand[] = Object.freeze([
  {
    lowerBound: new Decimal(0),
    rationale: "WITHIN_PERSONAL_ALLOWANCE",
    reason: "Profit sits within the personal allowance; contributions may still be due."
  },
  {
    lowerBound: new Decimal(12570),
    rationale: "BASIC_RATE_BAND",
    reason: "Profit reaches the basic rate band."
  },
  {
    lowerBound: new Decimal(50270),
    rationale: "HIGHER_RATE_BAND",
    reason: "Profit reaches the higher rate band."
  },
  {
    lowerBound: new Decimal(125140),
    rationale: "ADDITIONAL_RATE_BAND",
    reason: "Profit reaches the additional rate band."
  }
] satisfies ProfitBand[]);

/** Band with the greatest lower bound not above `profit`; profits below every bound fall in the first band. */
export function selectProfitBand(profit: MoneyInput, bands: readonly ProfitBand[] = PROFIT_BANDS): ProfitBand {
  const amount = toMoney(profit);
  const [first, ...rest] = bands;
  if (!first) {
    throw configurationError("Profit band table is empty.");
  }

  let selected = first;
  for (const band of rest) {
    if (band.lowerBound.gt(amount)) {
      break;
    }
    selected = band;
  }

  return selected;
}

function roundUpToStep(value: Decimal, step: number): number {
  return value.div(step).ceil().times(step).toNumber();
}

export function recommendSavingsRate(
  projectedProfit: MoneyInput,
  date: DateInput,
  registry: RulesetRegistry = getDefaultRegistry()
): RecommendationResult {
  const profit = toMoney(projectedProfit);

  if (profit.lte(0)) {
    return {
      percentage: DEFAULT_SAVINGS_PERCENTAGE,
      effectiveRate: roundCurrency(0),
      rationale: "NO_PROFIT",
      reason: NO_PROFIT_REASON,
      liability: null
    };
  }

  const liability = totalLiability(profit, date, registry);
  const effectiveRate = roundCurrency(liability.total.div(profit).times(100));
  const percentage = clamp(
    roundUpToStep(effectiveRate.plus(SAFETY_BUFFER_POINTS), PERCENTAGE_STEP),
    MIN_SAVINGS_PERCENTAGE,
    MAX_SAVINGS_PERCENTAGE
  );
  const band = selectProfitBand(profit);

  return {
    percentage,
    effectiveRate,
    rationale: band.rationale,
    reason: band.reason,
    liability
  };
}
