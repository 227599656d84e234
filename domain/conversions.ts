/**
 * Numeric adapter — durations from and to scalar amounts of a single unit.
 * Framework-independent.
 *
 * Every unit is a whole number of Planck times, so a scalar amount is
 * converted to Planck time once (truncating below one Planck time) and then
 * normalized by the general constructor.
 */

import type { Scalar, TimeUnit } from "./core.js";
import { DECIMAL_PRECISION, Dec, floorToBigInt, toDecimal } from "./decimal.js";
import { Duration } from "./duration.js";
import { OverflowError, ValidationError } from "./errors.js";
import { MAX_AEON_DIGITS, PLANCK_TIME_PER_UNIT } from "./units.js";

/** A duration of `value` units. NaN is rejected; ±Infinity gives a perpetual value. */
export function fromUnit(value: Scalar, unit: TimeUnit): Duration {
  const perUnit = PLANCK_TIME_PER_UNIT[unit];
  if (typeof value === "bigint") {
    return Duration.fromComponents({
      isNegative: value < 0n,
      planckTime: (value < 0n ? -value : value) * perUnit,
    });
  }
  const amount = toDecimal(value);
  if (amount.isNaN()) {
    throw new ValidationError("Duration amount must be a number", { unit });
  }
  if (!amount.isFinite()) {
    return amount.isNegative() ? Duration.NEGATIVE_INFINITY : Duration.POSITIVE_INFINITY;
  }
  const planckTime = amount.abs().times(perUnit.toString());
  if (planckTime.e >= DECIMAL_PRECISION) {
    throw new OverflowError(`Duration amount exceeds ${MAX_AEON_DIGITS} aeon digits`, { unit });
  }
  return Duration.fromComponents({
    isNegative: amount.isNegative(),
    planckTime: floorToBigInt(planckTime),
  });
}

export const fromAeons = (value: Scalar): Duration => fromUnit(value, "aeons");
export const fromYears = (value: Scalar): Duration => fromUnit(value, "years");
export const fromDays = (value: Scalar): Duration => fromUnit(value, "days");
export const fromHours = (value: Scalar): Duration => fromUnit(value, "hours");
export const fromMinutes = (value: Scalar): Duration => fromUnit(value, "minutes");
export const fromSeconds = (value: Scalar): Duration => fromUnit(value, "seconds");
export const fromMilliseconds = (value: Scalar): Duration => fromUnit(value, "milliseconds");
export const fromMicroseconds = (value: Scalar): Duration => fromUnit(value, "microseconds");
export const fromNanoseconds = (value: Scalar): Duration => fromUnit(value, "nanoseconds");
export const fromPicoseconds = (value: Scalar): Duration => fromUnit(value, "picoseconds");
export const fromFemtoseconds = (value: Scalar): Duration => fromUnit(value, "femtoseconds");
export const fromAttoseconds = (value: Scalar): Duration => fromUnit(value, "attoseconds");
export const fromZeptoseconds = (value: Scalar): Duration => fromUnit(value, "zeptoseconds");
export const fromYoctoseconds = (value: Scalar): Duration => fromUnit(value, "yoctoseconds");
export const fromPlanckTime = (value: Scalar): Duration => fromUnit(value, "planckTime");

/** Exact signed magnitude in Planck time. Perpetual values have none. */
export function totalPlanckTime(d: Duration): bigint {
  if (d.isPerpetual) {
    throw new ValidationError("A perpetual duration has no finite Planck time");
  }
  const total =
    d.totalYears * PLANCK_TIME_PER_UNIT.years +
    d.totalNanoseconds * PLANCK_TIME_PER_UNIT.nanoseconds +
    d.totalYoctoseconds * PLANCK_TIME_PER_UNIT.yoctoseconds +
    (d.planckTime ?? 0n);
  return d.isNegative ? -total : total;
}

/**
 * The duration as a floating-point amount of `unit`. Perpetual values give
 * ±Infinity, and so do finite values too large for a double.
 */
export function toUnit(d: Duration, unit: TimeUnit): number {
  if (d.isPerpetual) return d.isNegative ? -Infinity : Infinity;
  return new Dec(totalPlanckTime(d).toString()).div(PLANCK_TIME_PER_UNIT[unit].toString()).toNumber();
}

export const toAeons = (d: Duration): number => toUnit(d, "aeons");
export const toYears = (d: Duration): number => toUnit(d, "years");
export const toDays = (d: Duration): number => toUnit(d, "days");
export const toSeconds = (d: Duration): number => toUnit(d, "seconds");
export const toNanoseconds = (d: Duration): number => toUnit(d, "nanoseconds");
export const toPlanckTime = (d: Duration): number => toUnit(d, "planckTime");
