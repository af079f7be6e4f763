import Decimal from "decimal.js";
import { z } from "zod";

import { configurationError } from "../../shared/errors.js";
import { DECIMAL_PATTERN } from "../../shared/money.js";
import type { IncomeTaxBand, Ruleset } from "./types.js";

const decimalText = z.string().regex(DECIMAL_PATTERN, "Expected a decimal string");
const fiscalYearText = z.string().regex(/^\d{4}-\d{2}$/, "Expected a fiscal year label such as 2024-25");

export const rulesetDocumentSchema = z.object({
  fiscalYear: fiscalYearText,
  version: z.string().min(1),
  sequence: z.number().int().positive(),
  jurisdiction: z.literal("UK"),
  status: z.enum(["published", "provisional"]),
  effectiveFrom: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected an ISO calendar date"),
  personalAllowance: decimalText,
  incomeTax: z.object({
    bands: z
      .array(
        z.object({
          name: z.string().min(1),
          upperBound: decimalText.nullable(),
          rate: decimalText
        })
      )
      .min(1)
  }),
  flatContribution: z.object({
    threshold: decimalText,
    weeklyRate: decimalText
  }),
  profitContribution: z.object({
    lowerThreshold: decimalText,
    upperThreshold: decimalText,
    mainRate: decimalText,
    higherRate: decimalText
  }),
  vat: z.object({
    threshold: decimalText,
    registrationThreshold: decimalText
  }),
  notes: z.array(z.string()).default([])
});

/** By-value JSON form of a ruleset; amounts and rates are decimal strings. */
export type RulesetDocument = z.infer<typeof rulesetDocumentSchema>;

export const rulesetMetaSchema = z.object({
  jurisdiction: z.literal("UK"),
  rulesets: z
    .array(
      z.object({
        fiscalYear: fiscalYearText,
        version: z.string().min(1),
        path: z.string().min(1)
      })
    )
    .min(1)
});

export type RulesetMeta = z.infer<typeof rulesetMetaSchema>;

function toRuleset(document: RulesetDocument): Ruleset {
  const bands: IncomeTaxBand[] = document.incomeTax.bands.map((band) =>
    Object.freeze({
      name: band.name,
      upperBound: band.upperBound === null ? null : new Decimal(band.upperBound),
      rate: new Decimal(band.rate)
    })
  );

  return Object.freeze({
    fiscalYear: document.fiscalYear,
    version: document.version,
    sequence: document.sequence,
    jurisdiction: document.jurisdiction,
    status: document.status,
    effectiveFrom: document.effectiveFrom,
    personalAllowance: new Decimal(document.personalAllowance),
    incomeTax: Object.freeze({
      bands: Object.freeze(bands)
    }),
    flatContribution: Object.freeze({
      threshold: new Decimal(document.flatContribution.threshold),
      weeklyRate: new Decimal(document.flatContribution.weeklyRate)
    }),
    profitContribution: Object.freeze({
      lowerThreshold: new Decimal(document.profitContribution.lowerThreshold),
      upperThreshold: new Decimal(document.profitContribution.upperThreshold),
      mainRate: new Decimal(document.profitContribution.mainRate),
      higherRate: new Decimal(document.profitContribution.higherRate)
    }),
    vat: Object.freeze({
      threshold: new Decimal(document.vat.threshold),
      registrationThreshold: new Decimal(document.vat.registrationThreshold)
    }),
    notes: Object.freeze([...document.notes])
  });
}

export function rulesetInvariantProblems(ruleset: Ruleset): string[] {
  const problems: string[] = [];
  const rates: Array<[string, Decimal]> = [
    ...ruleset.incomeTax.bands.map((band): [string, Decimal] => [`incomeTax.${band.name}.rate`, band.rate]),
    ["profitContribution.mainRate", ruleset.profitContribution.mainRate],
    ["profitContribution.higherRate", ruleset.profitContribution.higherRate]
  ];
  const amounts: Array<[string, Decimal]> = [
    ["personalAllowance", ruleset.personalAllowance],
    ["flatContribution.threshold", ruleset.flatContribution.threshold],
    ["flatContribution.weeklyRate", ruleset.flatContribution.weeklyRate],
    ["profitContribution.lowerThreshold", ruleset.profitContribution.lowerThreshold],
    ["vat.threshold", ruleset.vat.threshold],
    ["vat.registrationThreshold", ruleset.vat.registrationThreshold]
  ];

  for (const [field, rate] of rates) {
    if (rate.lt(0) || rate.gt(1)) {
      problems.push(`${field} must be between 0 and 1.`);
    }
  }

  for (const [field, amount] of amounts) {
    if (amount.lt(0)) {
      problems.push(`${field} must not be negative.`);
    }
  }

  let previousBound = new Decimal(0);
  ruleset.incomeTax.bands.forEach((band, index) => {
    const isLast = index === ruleset.incomeTax.bands.length - 1;
    if (band.upperBound === null) {
      if (!isLast) {
        problems.push(`incomeTax.${band.name} is unbounded but is not the final band.`);
      }
      return;
    }

    if (isLast) {
      problems.push(`incomeTax.${band.name} is the final band and must be unbounded.`);
    }
    if (band.upperBound.lte(previousBound)) {
      problems.push(`incomeTax.${band.name}.upperBound must be greater than ${previousBound.toFixed()}.`);
    }
    previousBound = band.upperBound;
  });

  if (ruleset.profitContribution.upperThreshold.lte(ruleset.profitContribution.lowerThreshold)) {
    problems.push("profitContribution.upperThreshold must be greater than lowerThreshold.");
  }

  return problems;
}

export function parseRuleset(raw: unknown, source: string): Ruleset {
  const result = rulesetDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw configurationError(`Ruleset ${source} is malformed.`, {
      source,
      issues: result.error.issues
    });
  }

  const ruleset = toRuleset(result.data);
  const problems = rulesetInvariantProblems(ruleset);
  if (problems.length > 0) {
    throw configurationError(`Ruleset ${ruleset.version} is invalid: ${problems.join(" ")}`, {
      source,
      problems
    });
  }

  return ruleset;
}

export function serializeRuleset(ruleset: Ruleset): RulesetDocument {
  return {
    fiscalYear: ruleset.fiscalYear,
    version: ruleset.version,
    sequence: ruleset.sequence,
    jurisdiction: ruleset.jurisdiction,
    status: ruleset.status,
    effectiveFrom: ruleset.effectiveFrom,
    personalAllowance: ruleset.personalAllowance.toFixed(),
    incomeTax: {
      bands: ruleset.incomeTax.bands.map((band) => ({
        name: band.name,
        upperBound: band.upperBound === null ? null : band.upperBound.toFixed(),
        rate: band.rate.toFixed()
      }))
    },
    flatContribution: {
      threshold: ruleset.flatContribution.threshold.toFixed(),
      weeklyRate: ruleset.flatContribution.weeklyRate.toFixed()
    },
    profitContribution: {
      lowerThreshold: ruleset.profitContribution.lowerThreshold.toFixed(),
      upperThreshold: ruleset.profitContribution.upperThreshold.toFixed(),
      mainRate: ruleset.profitContribution.mainRate.toFixed(),
      higherRate: ruleset.profitContribution.higherRate.toFixed()
    },
    vat: {
      threshold: ruleset.vat.threshold.toFixed(),
      registrationThreshold: ruleset.vat.registrationThreshold.toFixed()
    },
    notes: [...ruleset.notes]
  };
}
