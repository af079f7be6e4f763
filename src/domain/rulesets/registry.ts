import { logger } from "../../infrastructure/logger.js";
import type { DateInput } from "../../shared/dates.js";
import { configurationError, rulesetNotFoundError } from "../../shared/errors.js";
import {
  assertFiscalCalendar,
  fiscalYearBounds,
  fiscalYearOf,
  isFiscalYearLabel,
  parseFiscalYearLabel
} from "../calendar/fiscal-year.js";
import { UK_FISCAL_CALENDAR, type FiscalCalendar, type FiscalYearLabel } from "../calendar/types.js";
import { loadRulesets } from "./loader.js";
import { parseRuleset, serializeRuleset } from "./schema.js";
import type { Ruleset } from "./types.js";

export interface RulesetRegistry {
  readonly calendar: Readonly<FiscalCalendar>;
  availableFiscalYears(): FiscalYearLabel[];
  lookupByLabel(fiscalYear: FiscalYearLabel): Ruleset;
  lookupByDate(date: DateInput): Ruleset;
  /** Accepts either a fiscal-year label (`2024-25`) or a calendar date. */
  lookup(dateOrLabel: DateInput): Ruleset;
}

export function createRulesetRegistry(
  rulesets: readonly Ruleset[],
  calendar: FiscalCalendar = UK_FISCAL_CALENDAR
): RulesetRegistry {
  assertFiscalCalendar(calendar);
  const frozenCalendar = Object.freeze({ ...calendar });
  const ordered = [...rulesets].sort(
    (left, right) => parseFiscalYearLabel(left.fiscalYear) - parseFiscalYearLabel(right.fiscalYear)
  );
  const entries = new Map<FiscalYearLabel, Ruleset>();

  for (const candidate of ordered) {
    // Stored rulesets are re-validated, frozen copies of what the caller passed.
    const ruleset = parseRuleset(serializeRuleset(candidate), candidate.version);
    if (entries.has(ruleset.fiscalYear)) {
      throw configurationError(`Duplicate ruleset for fiscal year ${ruleset.fiscalYear}.`, {
        fiscalYear: ruleset.fiscalYear
      });
    }

    const { start } = fiscalYearBounds(ruleset.fiscalYear, frozenCalendar);
    if (ruleset.effectiveFrom !== start) {
      throw configurationError(
        `Ruleset ${ruleset.version} takes effect on ${ruleset.effectiveFrom}, but fiscal year ${ruleset.fiscalYear} starts on ${start}.`,
        { version: ruleset.version }
      );
    }

    const previous = [...entries.values()].at(-1);
    if (previous && ruleset.sequence <= previous.sequence) {
      throw configurationError(
        `Ruleset ${ruleset.version} has sequence ${ruleset.sequence}, which does not follow ${previous.version} (${previous.sequence}).`,
        { version: ruleset.version, previousVersion: previous.version }
      );
    }

    entries.set(ruleset.fiscalYear, ruleset);
  }

  const available = [...entries.keys()];

  function lookupByLabel(fiscalYear: FiscalYearLabel): Ruleset {
    const ruleset = entries.get(fiscalYear);
    if (!ruleset) {
      logger.warn({ fiscalYear, available }, "ruleset lookup missed");
      throw rulesetNotFoundError(fiscalYear, available);
    }

    return ruleset;
  }

  function lookupByDate(date: DateInput): Ruleset {
    return lookupByLabel(fiscalYearOf(date, frozenCalendar));
  }

  return {
    calendar: frozenCalendar,
    availableFiscalYears: () => [...available],
    lookupByLabel,
    lookupByDate,
    lookup: (dateOrLabel) =>
      typeof dateOrLabel === "string" && isFiscalYearLabel(dateOrLabel)
        ? lookupByLabel(dateOrLabel)
        : lookupByDate(dateOrLabel)
  };
}

let defaultRegistry: RulesetRegistry | undefined;

/** Registry backed by the authored ruleset files, loaded once per process. */
export function getDefaultRegistry(): RulesetRegistry {
  if (!defaultRegistry) {
    const rulesets = loadRulesets();
    defaultRegistry = createRulesetRegistry(rulesets);
    logger.debug({ fiscalYears: defaultRegistry.availableFiscalYears() }, "rulesets loaded");
  }

  return defaultRegistry;
}

export function lookupRuleset(dateOrLabel: DateInput, registry: RulesetRegistry = getDefaultRegistry()): Ruleset {
  return registry.lookup(dateOrLabel);
}
