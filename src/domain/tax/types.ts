import type { Money } from "../../shared/money.js";
import type { FiscalYearLabel } from "../calendar/types.js";

/**
 * Itemized liability for one profit figure. Every component is rounded half-up to pence,
 * and `total` is their exact sum. A breakdown is only meaningful together with
 * `rulesetVersion`: the same profit under another year's ruleset is a different liability.
 */
export interface LiabilityBreakdown {
  fiscalYear: FiscalYearLabel;
  rulesetVersion: string;
  netProfit: Money;
  incomeTax: Money;
  flatContribution: Money;
  profitContribution: Money;
  total: Money;
}

export type RationaleTag =
  | "NO_PROFIT"
  | "WITHIN_PERSONAL_ALLOWANCE"
  | "BASIC_RATE_BAND"
  | "HIGHER_RATE_BAND"
  | "ADDITIONAL_RATE_BAND";

export interface ProfitBand {
  lowerBound: Money;
  rationale: Exclude<RationaleTag, "NO_PROFIT">;
  reason: string;
}

export interface RecommendationResult {
  /** Whole percentage, a multiple of 5. */
  percentage: number;
  effectiveRate: Money;
  rationale: RationaleTag;
  reason: string;
  liability: LiabilityBreakdown | null;
}
