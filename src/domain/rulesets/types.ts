import type Decimal from "decimal.js";

import type { IsoDate } from "../../shared/dates.js";
import type { FiscalYearLabel } from "../calendar/types.js";

export type RulesetStatus = "published" | "provisional";

export interface IncomeTaxBand {
  readonly name: string;
  /** Upper edge of the band on the taxable base; `null` for the final, unbounded band. */
  readonly upperBound: Decimal | null;
  readonly rate: Decimal;
}

/** Weekly flat-rate contribution owed once profit reaches the threshold (Class 2 style). */
export interface FlatContributionRules {
  readonly threshold: Decimal;
  readonly weeklyRate: Decimal;
}

/** Profit-based contribution with a main and a higher band (Class 4 style). */
export interface ProfitContributionRules {
  readonly lowerThreshold: Decimal;
  readonly upperThreshold: Decimal;
  readonly mainRate: Decimal;
  readonly higherRate: Decimal;
}

export interface VatRules {
  readonly threshold: Decimal;
  readonly registrationThreshold: Decimal;
}

export interface Ruleset {
  readonly fiscalYear: FiscalYearLabel;
  readonly version: string;
  readonly sequence: number;
  readonly jurisdiction: "UK";
  readonly status: RulesetStatus;
  readonly effectiveFrom: IsoDate;
  readonly personalAllowance: Decimal;
  readonly incomeTax: {
    readonly bands: readonly IncomeTaxBand[];
  };
  readonly flatContribution: FlatContributionRules;
  readonly profitContribution: ProfitContributionRules;
  readonly vat: VatRules;
  readonly notes: readonly string[];
}
