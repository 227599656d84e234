/**
 * Domain validation — assertions and invariants.
 * Framework-independent.
 */

import { InvariantViolation, ValidationError, type ErrorMetadata } from "./errors.js";

/** Throws ValidationError if condition is falsy. TypeScript narrows after a successful call. */
export function assert(condition: unknown, message: string, metadata?: ErrorMetadata): asserts condition {
  if (!condition) {
    throw new ValidationError(message, metadata);
  }
}

/** Like assert, but for invariants of canonical values. Throws InvariantViolation. */
export function invariant(condition: unknown, message: string, metadata?: ErrorMetadata): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message, metadata);
  }
}

/** Call in unreachable branches (e.g. exhaustive switch). Always throws. */
export function neverReached(value: never, message = "Unreachable"): never {
  throw new InvariantViolation(message, { value });
}
