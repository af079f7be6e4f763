import Decimal from "decimal.js";
import { z } from "zod";

import { validationError } from "../shared/errors.js";
import { DECIMAL_PATTERN } from "../shared/money.js";

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected an ISO calendar date (YYYY-MM-DD)");
const fiscalYear = z.string().regex(/^\d{4}-\d{2}$/, "Expected a fiscal year label such as 2024-25");

function isDecimalValue(value: string | number): boolean {
  return typeof value === "number" ? Number.isFinite(value) : DECIMAL_PATTERN.test(value);
}

const amount = z
  .union([z.string().regex(DECIMAL_PATTERN, "Expected a decimal amount"), z.number()])
  .refine(
    (value) => isDecimalValue(value) && new Decimal(value).decimalPlaces() <= 2,
    "Amounts are limited to two decimal places"
  );

const nonNegativeAmount = amount.refine(
  (value) => isDecimalValue(value) && new Decimal(value).gte(0),
  "Amount must not be negative"
);

export const incomeEntrySchema = z.object({
  date: isoDate,
  amount: nonNegativeAmount,
  description: z.string().max(500).optional(),
  taxSaved: nonNegativeAmount.nullable().optional()
});

export const expenseEntrySchema = z.object({
  date: isoDate,
  amount: nonNegativeAmount,
  description: z.string().max(500).optional(),
  category: z.string().max(120).optional()
});

export const fiscalYearSummaryInputSchema = z.object({
  fiscalYear,
  incomes: z.array(incomeEntrySchema).default([]),
  expenses: z.array(expenseEntrySchema).default([]),
  setAsidePercentage: nonNegativeAmount.default(20),
  tradingStartDate: isoDate.nullable().optional()
});

export const assessmentReportInputSchema = z.object({
  referenceDate: isoDate,
  anchorDay: z.number().int(),
  incomes: z.array(incomeEntrySchema).default([]),
  expenses: z.array(expenseEntrySchema).default([])
});

export const assessmentHistoryInputSchema = z.object({
  from: isoDate,
  to: isoDate,
  anchorDay: z.number().int(),
  incomes: z.array(incomeEntrySchema).default([]),
  expenses: z.array(expenseEntrySchema).default([])
});

export const taxSnapshotInputSchema = z.object({
  fiscalYear,
  incomes: z.array(incomeEntrySchema).default([]),
  expenses: z.array(expenseEntrySchema).default([])
});

export type IncomeEntry = z.infer<typeof incomeEntrySchema>;
export type ExpenseEntry = z.infer<typeof expenseEntrySchema>;
export type FiscalYearSummaryInput = z.input<typeof fiscalYearSummaryInputSchema>;
export type AssessmentReportInput = z.input<typeof assessmentReportInputSchema>;
export type AssessmentHistoryInput = z.input<typeof assessmentHistoryInputSchema>;
export type TaxSnapshotInput = z.input<typeof taxSnapshotInputSchema>;

export function parseInput<T extends z.ZodType>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw validationError("Input failed validation.", {
      issues: result.error.issues
    });
  }

  return result.data;
}
