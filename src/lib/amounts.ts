/**
 * Fixed-point conversion between human decimal amounts and on-chain integer units.
 *
 * All arithmetic runs on decimal.js; a number argument is read through its
 * shortest decimal string (0.1 stays 0.1), never through its binary value.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { Coin } from './config';
import { FLOAT_SCALAR, U128_MAX, U64_MAX } from './constants';
import { AmountRangeError, NumericParseError } from './errors';

/** Ties round away from zero: 0.5 unit -> 1 unit, 2.5 units -> 3 units. */
export const AMOUNT_ROUNDING = Decimal.ROUND_HALF_UP;

/** Fractional digits kept when rendering units back to a decimal. */
export const DISPLAY_PRECISION = 9;

const FixedPoint = Decimal.clone({ precision: 80, rounding: AMOUNT_ROUNDING, toExpNeg: -40, toExpPos: 80 });

export type DecimalInput = Decimal.Value;

export type AmountError = NumericParseError | AmountRangeError;

function parseAmount(value: DecimalInput): Result<Decimal, NumericParseError> {
  let parsed: Decimal;
  try {
    parsed = new FixedPoint(value);
  } catch (error) {
    return err(new NumericParseError(String(value), 'not a decimal number', { cause: error }));
  }
  if (!parsed.isFinite()) {
    return err(new NumericParseError(String(value), 'must be finite'));
  }
  return ok(parsed);
}

function toInteger(scaled: Decimal, limit: bigint): Result<bigint, AmountRangeError> {
  if (scaled.lessThan(0)) {
    return err(new AmountRangeError(scaled.toString(), limit.toString()));
  }
  const units = BigInt(scaled.toDecimalPlaces(0, AMOUNT_ROUNDING).toFixed(0));
  if (units > limit) {
    return err(new AmountRangeError(scaled.toString(), limit.toString()));
  }
  return ok(units);
}

/**
 * An integer the caller already holds in on-chain units, checked against u64.
 */
export function checkU64(value: bigint): Result<bigint, AmountRangeError> {
  return value < 0n || value > U64_MAX ? err(new AmountRangeError(value.toString(), U64_MAX.toString())) : ok(value);
}

/**
 * round(amount * coin.scalar) as a u64.
 */
export function toUnits(amount: DecimalInput, coin: Coin): Result<bigint, AmountError> {
  return parseAmount(amount).andThen((value) => toInteger(value.times(coin.scalar), U64_MAX));
}

/**
 * units / coin.scalar, rounded half-up to DISPLAY_PRECISION fractional digits.
 */
export function toDecimal(units: bigint | string, coin: Coin): Decimal {
  const rendered = new FixedPoint(units.toString()).dividedBy(coin.scalar).toFixed(DISPLAY_PRECISION);
  return new FixedPoint(rendered);
}

/**
 * On-chain price: round(price * FLOAT_SCALAR * quote.scalar / base.scalar).
 *
 * Rounding happens once, after all three factors are applied. Rounding the
 * price to quote units first (or dividing first) gives different integers
 * for prices near the smallest tick.
 */
export function priceToInput(price: DecimalInput, base: Coin, quote: Coin): Result<bigint, AmountError> {
  return parseAmount(price).andThen((value) =>
    toInteger(value.times(FLOAT_SCALAR.toString()).times(quote.scalar).dividedBy(base.scalar), U64_MAX),
  );
}

/**
 * Inverse of priceToInput, for displaying on-chain prices.
 */
export function inputToPrice(input: bigint | string, base: Coin, quote: Coin): Decimal {
  const rendered = new FixedPoint(input.toString())
    .times(base.scalar)
    .dividedBy(FLOAT_SCALAR.toString())
    .dividedBy(quote.scalar)
    .toFixed(DISPLAY_PRECISION);
  return new FixedPoint(rendered);
}

// ============== Identifiers ==============

const UNSIGNED_INTEGER = /^\d+$/;

/**
 * Parse a textual identifier as an unsigned integer of the given width.
 */
export function parseUnsignedId(text: string, bits: 64 | 128): Result<bigint, NumericParseError> {
  const trimmed = text.trim();
  if (!UNSIGNED_INTEGER.test(trimmed)) {
    return err(new NumericParseError(text, 'expected an unsigned integer'));
  }
  const value = BigInt(trimmed);
  const limit = bits === 64 ? U64_MAX : U128_MAX;
  if (value > limit) {
    return err(new NumericParseError(text, `exceeds u${bits}`));
  }
  return ok(value);
}
