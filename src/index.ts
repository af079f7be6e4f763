export {
  assessmentPeriod,
  assessmentPeriodsBetween,
  MAX_ANCHOR_DAY,
  MIN_ANCHOR_DAY,
  nextAssessmentPeriod,
  periodContains
} from "./domain/calendar/assessment-period.js";
export {
  currentFiscalYear,
  fiscalYearBounds,
  fiscalYearOf,
  formatFiscalYearLabel,
  parseFiscalYearLabel,
  registrationDeadline
} from "./domain/calendar/fiscal-year.js";
export { UK_FISCAL_CALENDAR } from "./domain/calendar/types.js";
export type { AssessmentPeriod, DateRange, FiscalCalendar, FiscalYearLabel } from "./domain/calendar/types.js";
export { loadRulesets } from "./domain/rulesets/loader.js";
export { createRulesetRegistry, getDefaultRegistry, lookupRuleset } from "./domain/rulesets/registry.js";
export type { RulesetRegistry } from "./domain/rulesets/registry.js";
export { parseRuleset, serializeRuleset } from "./domain/rulesets/schema.js";
export type { RulesetDocument } from "./domain/rulesets/schema.js";
export type { IncomeTaxBand, Ruleset, RulesetStatus } from "./domain/rulesets/types.js";
export { buildTaxSnapshot, parseTaxSnapshot, rulesetChecksum, verifyTaxSnapshot } from "./domain/snapshots/snapshot.js";
export type { SnapshotVerification } from "./domain/snapshots/snapshot.js";
export type { TaxSnapshot } from "./domain/snapshots/schema.js";
export {
  calculateLiability,
  computeFlatContribution,
  computeIncomeTax,
  computeProfitContribution,
  taxToSetAside,
  totalLiability,
  vatThresholdProximity
} from "./domain/tax/calculator.js";
export { PROFIT_BANDS, recommendSavingsRate, selectProfitBand } from "./domain/tax/recommendation.js";
export type { LiabilityBreakdown, ProfitBand, RationaleTag, RecommendationResult } from "./domain/tax/types.js";
export { buildAssessmentHistory, buildAssessmentReport } from "./services/assessment-service.js";
export type { AssessmentReport } from "./services/assessment-service.js";
export { createTaxSnapshot, verifyStoredSnapshot } from "./services/snapshot-service.js";
export { summarizeFiscalYear } from "./services/summary-service.js";
export type { FiscalYearSummary } from "./services/summary-service.js";
export { isCoreError } from "./shared/errors.js";
export type { CoreError, CoreErrorCode } from "./shared/errors.js";
export type { DateInput, IsoDate } from "./shared/dates.js";
export { formatMoney } from "./shared/money.js";
export type { Money, MoneyInput } from "./shared/money.js";
