/**
 * Decimal arithmetic for scaling and unit conversion.
 * A private decimal.js constructor so callers' global Decimal settings never leak in.
 */

import { Decimal } from "decimal.js";
import type { Scalar } from "./core.js";
import { MAX_AEON_DIGITS } from "./units.js";

/** Enough significant digits for the largest aeon count expressed in Planck time. */
export const DECIMAL_PRECISION = MAX_AEON_DIGITS + 100;

export const Dec = Decimal.clone({
  precision: DECIMAL_PRECISION,
  rounding: Decimal.ROUND_DOWN,
  toExpNeg: -9e15,
  toExpPos: 9e15,
});

/** Convert any Scalar to a Decimal. NaN and ±Infinity survive as Decimal NaN/Infinity. */
export function toDecimal(value: Scalar): Decimal {
  return typeof value === "bigint" ? new Dec(value.toString()) : new Dec(value);
}

/** Nearest integer to a finite, non-negative Decimal as a bigint; halves round up. */
export function roundToBigInt(value: Decimal): bigint {
  return BigInt(value.toDecimalPlaces(0, Dec.ROUND_HALF_UP).toFixed(0));
}

/** Integer part of a finite, non-negative Decimal as a bigint. */
export function floorToBigInt(value: Decimal): bigint {
  return BigInt(value.floor().toFixed(0));
}
