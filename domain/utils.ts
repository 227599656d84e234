/**
 * Domain utilities — pure digit and bigint helpers, no duration logic.
 * Framework-independent.
 */

const DIGITS = /^[0-9]+$/;

/** True if s is a non-empty run of ASCII digits. */
export function isDigits(s: string): boolean {
  return DIGITS.test(s);
}

/** Zero-pad a non-negative integer to at least `width` digits. */
export function padDigits(value: number | bigint, width: number): string {
  return value.toString().padStart(width, "0");
}

/** 10^n as a bigint. */
export function pow10(n: number): bigint {
  return 10n ** BigInt(n);
}

/**
 * Render a non-negative bigint with at most `precision` significant digits.
 * precision 1 means all digits. Longer values become "d.dddE+XX" (truncated).
 */
export function formatSignificant(value: bigint, precision: number): string {
  const digits = value.toString();
  if (precision <= 1 || digits.length <= precision) return digits;
  const mantissa = digits.slice(1, precision).replace(/0+$/, "");
  const exponent = padDigits(digits.length - 1, 2);
  return `${digits.charAt(0)}${mantissa ? `.${mantissa}` : ""}E+${exponent}`;
}

/** Null for zero or negative, the value otherwise. */
export function positiveOrNull(value: bigint | null | undefined): bigint | null {
  return value != null && value > 0n ? value : null;
}
