import { z } from "zod";

import { isSnapshotId } from "../../shared/ids.js";
import { DECIMAL_PATTERN } from "../../shared/money.js";
import { rulesetDocumentSchema } from "../rulesets/schema.js";

const decimalText = z.string().regex(DECIMAL_PATTERN, "Expected a decimal string");
const isoDateText = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected an ISO calendar date");

/**
 * Stored form of a liability calculation. It embeds the full ruleset by value, so a record
 * can be re-verified without the live registry.
 */
export const taxSnapshotSchema = z.object({
  id: z.string().refine(isSnapshotId, "Expected a uuid v7 snapshot id"),
  createdAt: z.iso.datetime(),
  fiscalYear: z.string().regex(/^\d{4}-\d{2}$/),
  fiscalYearStart: isoDateText,
  fiscalYearEnd: isoDateText,
  totalIncome: decimalText,
  totalExpenses: decimalText,
  netProfit: decimalText,
  liability: z.object({
    incomeTax: decimalText,
    flatContribution: decimalText,
    profitContribution: decimalText,
    total: decimalText
  }),
  rulesetVersion: z.string().min(1),
  ruleset: rulesetDocumentSchema,
  rulesetChecksum: z.string().regex(/^[0-9a-f]{64}$/, "Expected a sha256 hex digest")
});

export type TaxSnapshot = z.infer<typeof taxSnapshotSchema>;
