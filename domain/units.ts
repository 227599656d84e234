/**
 * Radix constants for the duration chain.
 * aeon → year → nanosecond → yoctosecond → Planck time.
 *
 * A day is 86,400 s and a year is 365.25 days; neither follows a calendar.
 */

import type { TimeUnit } from "./core.js";

// --- Chain radices ---

export const YEARS_PER_AEON = 1_000_000_000;
export const YEARS_PER_AEON_BIG = 1_000_000_000n;

export const NANOSECONDS_PER_MICROSECOND = 1_000n;
export const NANOSECONDS_PER_MILLISECOND = 1_000_000n;
export const NANOSECONDS_PER_SECOND = 1_000_000_000n;
export const NANOSECONDS_PER_MINUTE = 60n * NANOSECONDS_PER_SECOND;
export const NANOSECONDS_PER_HOUR = 3_600n * NANOSECONDS_PER_SECOND;
export const NANOSECONDS_PER_DAY = 86_400n * NANOSECONDS_PER_SECOND;
export const NANOSECONDS_PER_YEAR = 31_557_600n * NANOSECONDS_PER_SECOND;

export const YOCTOSECONDS_PER_ZEPTOSECOND = 1_000n;
export const YOCTOSECONDS_PER_ATTOSECOND = 1_000_000n;
export const YOCTOSECONDS_PER_FEMTOSECOND = 1_000_000_000n;
export const YOCTOSECONDS_PER_PICOSECOND = 1_000_000_000_000n;
export const YOCTOSECONDS_PER_NANOSECOND = 1_000_000_000_000_000n;

export const PLANCK_TIME_PER_YOCTOSECOND = 185_486_100_000_000_000_000n;

// --- Sub-field radices used by the projections ---

export const HOURS_PER_DAY = 24n;
export const MINUTES_PER_HOUR = 60n;
export const SECONDS_PER_MINUTE = 60n;
export const MILLISECONDS_PER_SECOND = 1_000n;
export const MICROSECONDS_PER_MILLISECOND = 1_000n;
export const FEMTOSECONDS_PER_PICOSECOND = 1_000n;
export const ATTOSECONDS_PER_FEMTOSECOND = 1_000n;
export const ZEPTOSECONDS_PER_ATTOSECOND = 1_000n;

export const DAYS_PER_YEAR = 365.25;
export const SECONDS_PER_DAY = 86_400;
export const SECONDS_PER_YEAR = 31_557_600;

/** Digits kept after the decimal point of a second before Planck time: 9 ns + 15 ys. */
export const NANOSECOND_FRACTION_DIGITS = 9;
export const YOCTOSECOND_FRACTION_DIGITS = 15;

// --- Limits ---

/** Largest aeon count, in decimal digits, a single value may carry. */
export const MAX_AEON_DIGITS = 1_000;

// --- Planck time per unit ---

const PLANCK_TIME_PER_NANOSECOND = PLANCK_TIME_PER_YOCTOSECOND * YOCTOSECONDS_PER_NANOSECOND;
const PLANCK_TIME_PER_YEAR = PLANCK_TIME_PER_NANOSECOND * NANOSECONDS_PER_YEAR;

/** Every unit is a whole number of Planck times. */
export const PLANCK_TIME_PER_UNIT: Readonly<Record<TimeUnit, bigint>> = {
  aeons: PLANCK_TIME_PER_YEAR * YEARS_PER_AEON_BIG,
  years: PLANCK_TIME_PER_YEAR,
  days: PLANCK_TIME_PER_NANOSECOND * NANOSECONDS_PER_DAY,
  hours: PLANCK_TIME_PER_NANOSECOND * NANOSECONDS_PER_HOUR,
  minutes: PLANCK_TIME_PER_NANOSECOND * NANOSECONDS_PER_MINUTE,
  seconds: PLANCK_TIME_PER_NANOSECOND * NANOSECONDS_PER_SECOND,
  milliseconds: PLANCK_TIME_PER_NANOSECOND * NANOSECONDS_PER_MILLISECOND,
  microseconds: PLANCK_TIME_PER_NANOSECOND * NANOSECONDS_PER_MICROSECOND,
  nanoseconds: PLANCK_TIME_PER_NANOSECOND,
  picoseconds: PLANCK_TIME_PER_YOCTOSECOND * YOCTOSECONDS_PER_PICOSECOND,
  femtoseconds: PLANCK_TIME_PER_YOCTOSECOND * YOCTOSECONDS_PER_FEMTOSECOND,
  attoseconds: PLANCK_TIME_PER_YOCTOSECOND * YOCTOSECONDS_PER_ATTOSECOND,
  zeptoseconds: PLANCK_TIME_PER_YOCTOSECOND * YOCTOSECONDS_PER_ZEPTOSECOND,
  yoctoseconds: PLANCK_TIME_PER_YOCTOSECOND,
  planckTime: 1n,
};
