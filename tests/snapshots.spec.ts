import Decimal from "decimal.js";
import { describe, expect, it } from "vitest";

import { createRulesetRegistry, getDefaultRegistry } from "../src/domain/rulesets/registry.js";
import { parseRuleset, serializeRuleset } from "../src/domain/rulesets/schema.js";
import { buildTaxSnapshot, parseTaxSnapshot, rulesetChecksum, verifyTaxSnapshot } from "../src/domain/snapshots/snapshot.js";
import type { TaxSnapshot } from "../src/domain/snapshots/schema.js";
import { isSnapshotId } from "../src/shared/ids.js";
import { captureCoreError, rulesetDocument } from "./helpers.js";

function snapshotFor2024(): TaxSnapshot {
  return buildTaxSnapshot({
    totalIncome: new Decimal("45000"),
    totalExpenses: new Decimal("15000"),
    ruleset: getDefaultRegistry().lookupByLabel("2024-25"),
    createdAt: new Date("2025-05-01T10:00:00.000Z")
  });
}

describe("tax snapshots", () => {
  it("capture totals, the breakdown and the ruleset by value", () => {
    const ruleset = getDefaultRegistry().lookupByLabel("2024-25");
    const snapshot = snapshotFor2024();

    expect(snapshot.createdAt).toBe("2025-05-01T10:00:00.000Z");
    expect(snapshot.fiscalYear).toBe("2024-25");
    expect(snapshot.fiscalYearStart).toBe("2024-04-06");
    expect(snapshot.fiscalYearEnd).toBe("2025-04-05");
    expect(snapshot.totalIncome).toBe("45000.00");
    expect(snapshot.totalExpenses).toBe("15000.00");
    expect(snapshot.netProfit).toBe("30000.00");
    expect(snapshot.liability).toEqual({
      incomeTax: "3486.00",
      flatContribution: "179.40",
      profitContribution: "1568.70",
      total: "5234.10"
    });
    expect(snapshot.rulesetVersion).toBe("2024-25-v1");
    expect(snapshot.ruleset).toEqual(serializeRuleset(ruleset));
    expect(snapshot.rulesetChecksum).toBe(rulesetChecksum(ruleset));
    expect(snapshot.rulesetChecksum).toMatch(/^[0-9a-f]{64}$/);
  });

  it("give every snapshot its own time-ordered id", () => {
    const first = snapshotFor2024();
    const second = snapshotFor2024();

    expect(isSnapshotId(first.id)).toBe(true);
    expect(second.id).not.toBe(first.id);
  });

  it("verify when untouched, including after a JSON round trip", () => {
    const snapshot = snapshotFor2024();
    const stored = parseTaxSnapshot(JSON.parse(JSON.stringify(snapshot)));

    expect(verifyTaxSnapshot(snapshot).valid).toBe(true);
    const verification = verifyTaxSnapshot(stored);
    expect(verification.valid).toBe(true);
    expect(verification.mismatches).toEqual([]);
    expect(verification.recomputed?.total.toFixed(2)).toBe("5234.10");
  });

  it("report a tampered total", () => {
    const snapshot = snapshotFor2024();
    const tampered: TaxSnapshot = {
      ...snapshot,
      liability: { ...snapshot.liability, total: "9999.99" }
    };

    const verification = verifyTaxSnapshot(tampered);

    expect(verification.valid).toBe(false);
    expect(verification.mismatches).toEqual(["liability.total"]);
  });

  it("report a tampered embedded ruleset", () => {
    const snapshot = snapshotFor2024();
    const tampered: TaxSnapshot = {
      ...snapshot,
      ruleset: {
        ...snapshot.ruleset,
        incomeTax: {
          bands: snapshot.ruleset.incomeTax.bands.map((band, index) =>
            index === 0 ? { ...band, rate: "0.25" } : band
          )
        }
      }
    };

    const verification = verifyTaxSnapshot(tampered);

    expect(verification.mismatches).toEqual(["rulesetChecksum", "liability.incomeTax", "liability.total"]);
    expect(verification.recomputed?.incomeTax.toFixed(2)).toBe("4357.50");
  });

  it("report an embedded ruleset that no longer passes its own rules", () => {
    const snapshot = snapshotFor2024();
    const tampered: TaxSnapshot = {
      ...snapshot,
      ruleset: {
        ...snapshot.ruleset,
        profitContribution: { ...snapshot.ruleset.profitContribution, mainRate: "1.5" }
      }
    };

    expect(verifyTaxSnapshot(tampered)).toEqual({ valid: false, mismatches: ["ruleset"], recomputed: null });
  });

  it("verify from the embedded ruleset alone", () => {
    const custom = parseRuleset(rulesetDocument({ personalAllowance: "10000" }), "custom ruleset");
    const registry = createRulesetRegistry([custom]);
    const snapshot = buildTaxSnapshot({
      totalIncome: new Decimal("30000"),
      totalExpenses: new Decimal("0"),
      ruleset: registry.lookupByLabel("2024-25")
    });

    expect(snapshot.liability.incomeTax).toBe("4000.00");
    expect(verifyTaxSnapshot(snapshot).valid).toBe(true);
  });

  it("reject malformed records", () => {
    const error = captureCoreError(() => parseTaxSnapshot({}), "VALIDATION_ERROR");

    expect(error.message).toBe("Tax snapshot is malformed.");
  });

  it("reject records whose creation time is not an ISO timestamp", () => {
    const stored = { ...snapshotFor2024(), createdAt: "yesterday" };

    captureCoreError(() => parseTaxSnapshot(stored), "VALIDATION_ERROR");
  });

  it("reject records whose id is not a uuid v7", () => {
    const stored = { ...snapshotFor2024(), id: "snapshot-1" };

    captureCoreError(() => parseTaxSnapshot(stored), "VALIDATION_ERROR");
  });
});
