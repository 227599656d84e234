/**
 * Domain core — structural primitives shared by every duration module.
 * Framework-independent. No arithmetic here.
 */

import type { Decimal } from "decimal.js";

// --- Scalars ---

/** Direction of a value: negative, zero or positive. */
export type Sign = -1 | 0 | 1;

/**
 * Numeric input accepted by the scaling operations and unit factories:
 * binary floating point, arbitrary-precision integer or fixed-precision decimal.
 */
export type Scalar = number | bigint | Decimal;

/** Integer component accepted by the normalizing constructor. */
export type ComponentValue = number | bigint;

// --- Units ---

/** Units a duration can be built from or converted to. */
export type TimeUnit =
  | "aeons"
  | "years"
  | "days"
  | "hours"
  | "minutes"
  | "seconds"
  | "milliseconds"
  | "microseconds"
  | "nanoseconds"
  | "picoseconds"
  | "femtoseconds"
  | "attoseconds"
  | "zeptoseconds"
  | "yoctoseconds"
  | "planckTime";

export const TIME_UNITS: readonly TimeUnit[] = [
  "aeons",
  "years",
  "days",
  "hours",
  "minutes",
  "seconds",
  "milliseconds",
  "microseconds",
  "nanoseconds",
  "picoseconds",
  "femtoseconds",
  "attoseconds",
  "zeptoseconds",
  "yoctoseconds",
  "planckTime",
];

/** Turn a three-way comparison result into a Sign. */
export const asSign = (n: number | bigint): Sign => (n > 0 ? 1 : n < 0 ? -1 : 0);
