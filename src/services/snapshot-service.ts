import type { FiscalCalendar } from "../domain/calendar/types.js";
import { getDefaultRegistry, type RulesetRegistry } from "../domain/rulesets/registry.js";
import type { TaxSnapshot } from "../domain/snapshots/schema.js";
import {
  buildTaxSnapshot,
  parseTaxSnapshot,
  verifyTaxSnapshot,
  type SnapshotVerification
} from "../domain/snapshots/snapshot.js";
import { logger } from "../infrastructure/logger.js";
import { parseInput, taxSnapshotInputSchema, type TaxSnapshotInput } from "./schemas.js";
import { entriesInFiscalYear, sumAmounts } from "./transactions.js";

export function createTaxSnapshot(
  input: TaxSnapshotInput,
  registry: RulesetRegistry = getDefaultRegistry(),
  now: Date = new Date()
): TaxSnapshot {
  const parsed = parseInput(taxSnapshotInputSchema, input);
  const ruleset = registry.lookupByLabel(parsed.fiscalYear);
  const { calendar } = registry;

  const snapshot = buildTaxSnapshot({
    totalIncome: sumAmounts(entriesInFiscalYear(parsed.incomes, parsed.fiscalYear, calendar)),
    totalExpenses: sumAmounts(entriesInFiscalYear(parsed.expenses, parsed.fiscalYear, calendar)),
    ruleset,
    calendar,
    createdAt: now
  });

  logger.info(
    {
      snapshotId: snapshot.id,
      fiscalYear: snapshot.fiscalYear,
      rulesetVersion: snapshot.rulesetVersion
    },
    "tax snapshot created"
  );

  return snapshot;
}

/** Parses a stored snapshot record and checks it against its own embedded ruleset. */
export function verifyStoredSnapshot(raw: unknown, calendar?: FiscalCalendar): SnapshotVerification {
  const snapshot = parseTaxSnapshot(raw);
  const verification = verifyTaxSnapshot(snapshot, calendar);

  if (!verification.valid) {
    logger.warn({ snapshotId: snapshot.id, mismatches: verification.mismatches }, "tax snapshot failed verification");
  }

  return verification;
}
