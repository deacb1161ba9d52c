/**
 * Exact decimal helpers for ledger amounts.
 *
 * Amounts are fixed-point with two fractional digits, matching NUMERIC(14,2) in Postgres.
 */

import Decimal from 'decimal.js';
import { AppError } from './AppError';

export const AMOUNT_SCALE = 2;

/** Integer digits of NUMERIC(14,2) */
export const AMOUNT_INTEGER_DIGITS = 12;

const AMOUNT_LIMIT = new Decimal(10).pow(AMOUNT_INTEGER_DIGITS);

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Parses a user or database supplied amount into a Decimal.
 * Accepts numbers, bigints, numeric strings and Decimals; throws a validation error otherwise.
 */
export function toDecimal(value: Decimal.Value): Decimal {
  if (Decimal.isDecimal(value)) {
    return value;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw AppError.validation(`Amount must be a finite number, got ${value}`);
    }
    return new Decimal(value);
  }

  if (typeof value === 'bigint') {
    return new Decimal(value.toString());
  }

  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw AppError.validation(`Amount must be a decimal number, got "${value}"`);
  }
  return new Decimal(trimmed);
}

/**
 * Validates a transaction amount: strictly positive, at most two fractional digits
 * and twelve integer digits.
 */
export function parsePositiveAmount(value: Decimal.Value): Decimal {
  const amount = toDecimal(value);

  if (amount.lte(0)) {
    throw AppError.validation('Amount must be greater than zero', { amount: amount.toString() });
  }
  if (amount.decimalPlaces() > AMOUNT_SCALE) {
    throw AppError.validation(`Amount supports at most ${AMOUNT_SCALE} decimal places`, {
      amount: amount.toString(),
    });
  }
  if (amount.gte(AMOUNT_LIMIT)) {
    throw AppError.validation(`Amount supports at most ${AMOUNT_INTEGER_DIGITS} integer digits`, {
      amount: amount.toString(),
    });
  }

  return amount;
}

/**
 * Sums a list of decimals; the empty sum is exact zero.
 */
export function sumDecimals(values: Decimal[]): Decimal {
  return values.reduce((total, value) => total.plus(value), new Decimal(0));
}

export { Decimal };
