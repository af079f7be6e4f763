import { getDefaultRegistry } from "../src/domain/rulesets/registry.js";
import { serializeRuleset, type RulesetDocument } from "../src/domain/rulesets/schema.js";
import { isCoreError, type CoreError, type CoreErrorCode } from "../src/shared/errors.js";

export function captureCoreError(fn: () => unknown, code: CoreErrorCode): CoreError {
  try {
    fn();
  } catch (error) {
    if (isCoreError(error, code)) {
      return error;
    }
    throw error;
  }

  throw new Error(`Expected a ${code} error to be thrown.`);
}

export function rulesetDocument(overrides: Partial<RulesetDocument> = {}): RulesetDocument {
  return {
    ...serializeRuleset(getDefaultRegistry().lookupByLabel("2024-25")),
    ...overrides
  };
}
