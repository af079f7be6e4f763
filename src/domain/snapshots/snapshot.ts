import Decimal from "decimal.js";

import { isCoreError, validationError } from "../../shared/errors.js";
import { jsonChecksum } from "../../shared/hash.js";
import { createSnapshotId } from "../../shared/ids.js";
import { formatMoney, type Money } from "../../shared/money.js";
import { fiscalYearBounds } from "../calendar/fiscal-year.js";
import { UK_FISCAL_CALENDAR, type FiscalCalendar } from "../calendar/types.js";
import { parseRuleset, serializeRuleset } from "../rulesets/schema.js";
import type { Ruleset } from "../rulesets/types.js";
import { calculateLiability } from "../tax/calculator.js";
import type { LiabilityBreakdown } from "../tax/types.js";
import { taxSnapshotSchema, type TaxSnapshot } from "./schema.js";

export interface SnapshotInput {
  totalIncome: Money;
  totalExpenses: Money;
  ruleset: Ruleset;
  calendar?: FiscalCalendar;
  createdAt?: Date;
}

export interface SnapshotVerification {
  valid: boolean;
  mismatches: string[];
  /** Null when the embedded ruleset itself is invalid. */
  recomputed: LiabilityBreakdown | null;
}

function readEmbeddedRuleset(snapshot: TaxSnapshot): Ruleset | null {
  try {
    return parseRuleset(snapshot.ruleset, `snapshot ${snapshot.id}`);
  } catch (error) {
    if (isCoreError(error, "CONFIGURATION_ERROR")) {
      return null;
    }
    throw error;
  }
}

export function rulesetChecksum(ruleset: Ruleset): string {
  return jsonChecksum(serializeRuleset(ruleset));
}

export function buildTaxSnapshot(input: SnapshotInput): TaxSnapshot {
  const { ruleset } = input;
  const netProfit = input.totalIncome.minus(input.totalExpenses);
  const liability = calculateLiability(netProfit, ruleset);
  const bounds = fiscalYearBounds(ruleset.fiscalYear, input.calendar ?? UK_FISCAL_CALENDAR);

  return {
    id: createSnapshotId(),
    createdAt: (input.createdAt ?? new Date()).toISOString(),
    fiscalYear: ruleset.fiscalYear,
    fiscalYearStart: bounds.start,
    fiscalYearEnd: bounds.end,
    totalIncome: formatMoney(input.totalIncome),
    totalExpenses: formatMoney(input.totalExpenses),
    netProfit: formatMoney(netProfit),
    liability: {
      incomeTax: formatMoney(liability.incomeTax),
      flatContribution: formatMoney(liability.flatContribution),
      profitContribution: formatMoney(liability.profitContribution),
      total: formatMoney(liability.total)
    },
    rulesetVersion: ruleset.version,
    ruleset: serializeRuleset(ruleset),
    rulesetChecksum: rulesetChecksum(ruleset)
  };
}

export function parseTaxSnapshot(raw: unknown): TaxSnapshot {
  const result = taxSnapshotSchema.safeParse(raw);
  if (!result.success) {
    throw validationError("Tax snapshot is malformed.", {
      issues: result.error.issues
    });
  }

  return result.data;
}

/** Recomputes a stored snapshot from its embedded ruleset only. */
export function verifyTaxSnapshot(
  snapshot: TaxSnapshot,
  calendar: FiscalCalendar = UK_FISCAL_CALENDAR
): SnapshotVerification {
  const ruleset = readEmbeddedRuleset(snapshot);
  if (!ruleset) {
    return { valid: false, mismatches: ["ruleset"], recomputed: null };
  }

  const mismatches: string[] = [];

  if (rulesetChecksum(ruleset) !== snapshot.rulesetChecksum) {
    mismatches.push("rulesetChecksum");
  }
  if (ruleset.version !== snapshot.rulesetVersion) {
    mismatches.push("rulesetVersion");
  }
  if (ruleset.fiscalYear !== snapshot.fiscalYear) {
    mismatches.push("fiscalYear");
  }

  const bounds = fiscalYearBounds(snapshot.fiscalYear, calendar);
  if (bounds.start !== snapshot.fiscalYearStart) {
    mismatches.push("fiscalYearStart");
  }
  if (bounds.end !== snapshot.fiscalYearEnd) {
    mismatches.push("fiscalYearEnd");
  }

  const netProfit = new Decimal(snapshot.netProfit);
  if (!new Decimal(snapshot.totalIncome).minus(snapshot.totalExpenses).eq(netProfit)) {
    mismatches.push("netProfit");
  }

  const recomputed = calculateLiability(netProfit, ruleset);
  const components = ["incomeTax", "flatContribution", "profitContribution", "total"] as const;
  for (const component of components) {
    if (!recomputed[component].eq(snapshot.liability[component])) {
      mismatches.push(`liability.${component}`);
    }
  }

  return {
    valid: mismatches.length === 0,
    mismatches,
    recomputed
  };
}
