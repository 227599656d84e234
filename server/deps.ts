/**
 * Server dependencies — configuration from the environment.
 * Swap the culture without touching domain/handler.
 */

import { cultureFromLocale, INVARIANT_CULTURE, type DurationCulture } from "../domain/culture.js";
import { ValidationError } from "../domain/errors.js";

const DEFAULT_PORT = 3_000;

export interface ServiceConfig {
  readonly port: number;
  /** Intl locale tag, or null for the invariant culture. */
  readonly locale: string | null;
  readonly culture: DurationCulture;
}

function parsePort(value: string | undefined): number {
  if (value === undefined || value.trim() === "") return DEFAULT_PORT;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new ValidationError("PORT must be an integer between 0 and 65535", { port: value });
  }
  return port;
}

function cultureFor(locale: string | null): DurationCulture {
  if (locale === null) return INVARIANT_CULTURE;
  try {
    return cultureFromLocale(locale);
  } catch (err) {
    if (err instanceof RangeError) {
      throw new ValidationError("DURATION_LOCALE must be a valid locale tag", { locale });
    }
    throw err;
  }
}

/** PORT (default 3000) and DURATION_LOCALE (default: invariant culture). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const locale = env.DURATION_LOCALE?.trim() || null;
  return {
    port: parsePort(env.PORT),
    locale,
    culture: cultureFor(locale),
  };
}
