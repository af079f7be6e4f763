import Decimal from "decimal.js";

import { validationError } from "./errors.js";

// Money is always a Decimal; binary floats only ever enter through toMoney.
export type Money = Decimal;
export type MoneyInput = Decimal.Value;

// Sums and products of accepted amounts must stay exact to the penny.
Decimal.set({ precision: 64 });

export const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

export function toMoney(value: MoneyInput): Money {
  if (typeof value === "string" && !DECIMAL_PATTERN.test(value.trim())) {
    throw validationError(`Invalid amount value: ${value}`, { value });
  }

  const amount = new Decimal(typeof value === "string" ? value.trim() : value);
  if (!amount.isFinite()) {
    throw validationError(`Amount must be a finite number, received ${String(value)}.`);
  }

  return amount;
}

export function roundCurrency(value: MoneyInput): Money {
  return new Decimal(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

export function sumMoney(values: readonly Money[]): Money {
  return values.reduce((sum, value) => sum.plus(value), new Decimal(0));
}

export function formatMoney(value: Money): string {
  return value.toFixed(2, Decimal.ROUND_HALF_UP);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
