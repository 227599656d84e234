/**
 * Pattern mini-language — tokenizer shared by the writer and the reader.
 *
 * A pattern is either a single standard letter, expanded through
 * STANDARD_PATTERNS, or a custom pattern tokenized into unit runs and
 * literals. Both format.ts and parse.ts walk the same token list, which
 * keeps them symmetric.
 */

/** A unit a custom pattern letter refers to. */
export type FormatUnit =
  | "totalYears"
  | "years"
  | "days"
  | "hours"
  | "minutes"
  | "seconds"
  | "secondFraction"
  | "milliseconds"
  | "microseconds"
  | "nanoseconds"
  | "picoseconds"
  | "femtoseconds"
  | "attoseconds"
  | "zeptoseconds"
  | "yoctoseconds"
  | "planckTime";

export type PatternToken =
  | { readonly kind: "unit"; readonly unit: FormatUnit; readonly count: number }
  | { readonly kind: "literal"; readonly text: string }
  | { readonly kind: "timeSeparator" }
  | { readonly kind: "dateSeparator" };

const UNIT_LETTERS: Readonly<Record<string, FormatUnit>> = {
  e: "totalYears",
  y: "years",
  d: "days",
  h: "hours",
  H: "hours",
  m: "minutes",
  s: "seconds",
  F: "secondFraction",
  M: "milliseconds",
  u: "microseconds",
  n: "nanoseconds",
  p: "picoseconds",
  f: "femtoseconds",
  a: "attoseconds",
  z: "zeptoseconds",
  Y: "yoctoseconds",
  P: "planckTime",
};

export const ROUND_TRIP_PATTERN = "e'-'n':'Y':'P";
export const GENERAL_LONG_PATTERN = "y d HH:mm:ss";

/** Single-letter patterns and the custom patterns they expand to. `X` is handled separately. */
export const STANDARD_PATTERNS: Readonly<Record<string, string>> = {
  d: "y d",
  D: "e d",
  E: "y d HH:mm:ss:MMM:uuu:nnn:ppp:fff:aaa:zzz:YYY:PPP",
  f: "e d HH:mm",
  F: "e d HH:mm:ss",
  g: "y d HH:mm",
  G: GENERAL_LONG_PATTERN,
  o: ROUND_TRIP_PATTERN,
  O: ROUND_TRIP_PATTERN,
  t: "HH:mm",
  T: "HH:mm:ss",
};

export const EXTENSIBLE_PATTERN = "X";

/** Order in which the auto-detecting reader tries the standard patterns. */
export const AUTO_DETECT_ORDER: readonly string[] = ["o", "E", "F", "f", "G", "g", "D", "d", "T", "t", "X"];

export type ResolvedPattern =
  | { readonly kind: "extensible" }
  | { readonly kind: "custom"; readonly tokens: readonly PatternToken[] };

/** Expand a caller pattern: standard letter, extensible, custom, or the general fallback. */
export function resolvePattern(pattern: string | null | undefined): ResolvedPattern {
  if (pattern == null || pattern.trim() === "") {
    return { kind: "custom", tokens: tokenizePattern(GENERAL_LONG_PATTERN) };
  }
  if (pattern.length === 1) {
    if (pattern === EXTENSIBLE_PATTERN) return { kind: "extensible" };
    return { kind: "custom", tokens: tokenizePattern(STANDARD_PATTERNS[pattern] ?? GENERAL_LONG_PATTERN) };
  }
  return { kind: "custom", tokens: tokenizePattern(pattern) };
}

/**
 * Split a custom pattern into unit runs and literals.
 * Repeated letters of one unit form a single run whose count is the repeat count.
 */
export function tokenizePattern(pattern: string): PatternToken[] {
  const tokens: PatternToken[] = [];
  let quote: "'" | '"' | null = null;
  let escaped = false;
  let literal = "";
  let run: { unit: FormatUnit; count: number } | null = null;

  const flushLiteral = (): void => {
    if (literal) tokens.push({ kind: "literal", text: literal });
    literal = "";
  };
  const flushRun = (): void => {
    if (run) tokens.push({ kind: "unit", unit: run.unit, count: run.count });
    run = null;
  };
  const pushLiteral = (ch: string): void => {
    flushRun();
    literal += ch;
  };

  for (const ch of pattern) {
    if (escaped) {
      pushLiteral(ch);
      escaped = false;
    } else if (ch === "\\") {
      flushRun();
      escaped = true;
    } else if (quote) {
      if (ch === quote) quote = null;
      else pushLiteral(ch);
    } else if (ch === "'" || ch === '"') {
      flushRun();
      quote = ch;
    } else if (ch === ":" || ch === "/") {
      flushRun();
      flushLiteral();
      tokens.push({ kind: ch === ":" ? "timeSeparator" : "dateSeparator" });
    } else if (ch === "%") {
      flushRun();
    } else {
      const unit = UNIT_LETTERS[ch];
      if (unit === undefined) {
        pushLiteral(ch);
      } else if (run !== null && run.unit === unit) {
        run.count++;
      } else {
        flushRun();
        flushLiteral();
        run = { unit, count: 1 };
      }
    }
  }
  flushRun();
  flushLiteral();
  return tokens;
}
