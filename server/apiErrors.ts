/**
 * API error model — standard payload shape.
 * Maps domain errors to HTTP codes.
 */

import { DurationFormatError, OverflowError, ValidationError } from "../domain/errors.js";

export type ErrorCode = "INVALID_INPUT" | "NOT_FOUND" | "OVERFLOW" | "INTERNAL_ERROR";

export interface ApiErrorPayload {
  readonly error: {
    readonly code: ErrorCode;
    readonly message: string;
    readonly details?: Record<string, unknown>;
  };
}

export function apiError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ApiErrorPayload {
  return { error: { code, message, ...(details != null && { details }) } };
}

export interface MappedError {
  readonly status: number;
  readonly payload: ApiErrorPayload;
}

/** Status and payload for a domain error; null for anything the caller should rethrow. */
export function mapDomainError(err: unknown): MappedError | null {
  if (err instanceof OverflowError) {
    return { status: 422, payload: apiError("OVERFLOW", err.message, err.metadata) };
  }
  if (err instanceof ValidationError || err instanceof DurationFormatError) {
    return { status: 400, payload: apiError("INVALID_INPUT", err.message, err.metadata) };
  }
  return null;
}
