const CORE_ERROR_CODES = ["CONFIGURATION_ERROR", "RULESET_NOT_FOUND", "VALIDATION_ERROR"] as const;

export type CoreErrorCode = (typeof CORE_ERROR_CODES)[number];

export type CoreError = Error & {
  code: CoreErrorCode;
  details?: Record<string, unknown>;
};

export function configurationError(message: string, details?: Record<string, unknown>): CoreError {
  return Object.assign(new Error(message), {
    name: "ConfigurationError",
    code: "CONFIGURATION_ERROR" as const,
    details
  });
}

export function rulesetNotFoundError(fiscalYear: string, available: readonly string[]): CoreError {
  const listed = available.length > 0 ? available.join(", ") : "none";
  return Object.assign(new Error(`No ruleset registered for fiscal year ${fiscalYear}. Available fiscal years: ${listed}.`), {
    name: "RulesetNotFoundError",
    code: "RULESET_NOT_FOUND" as const,
    details: {
      fiscalYear,
      available: [...available]
    }
  });
}

export function validationError(message: string, details?: Record<string, unknown>): CoreError {
  return Object.assign(new Error(message), {
    name: "ValidationError",
    code: "VALIDATION_ERROR" as const,
    details
  });
}

export function isCoreError(error: unknown, code?: CoreErrorCode): error is CoreError {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }

  const candidate = error.code;
  return CORE_ERROR_CODES.some((item) => item === candidate) && (code === undefined || candidate === code);
}
