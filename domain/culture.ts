/**
 * Culture-dependent symbols used by the writer and the reader.
 */

export interface DurationCulture {
  readonly positiveInfinitySymbol: string;
  readonly negativeInfinitySymbol: string;
  readonly negativeSign: string;
  readonly numberGroupSeparator: string;
  readonly numberDecimalSeparator: string;
  readonly timeSeparator: string;
  readonly dateSeparator: string;
}

/** Locale-independent symbols. Machine formats always use this one. */
export const INVARIANT_CULTURE: DurationCulture = Object.freeze({
  positiveInfinitySymbol: "Infinity",
  negativeInfinitySymbol: "-Infinity",
  negativeSign: "-",
  numberGroupSeparator: ",",
  numberDecimalSeparator: ".",
  timeSeparator: ":",
  dateSeparator: "/",
});

function numberPart(parts: Intl.NumberFormatPart[], type: Intl.NumberFormatPartTypes): string | undefined {
  return parts.find((p) => p.type === type)?.value;
}

function literalAfter(parts: Intl.DateTimeFormatPart[], type: Intl.DateTimeFormatPartTypes): string | undefined {
  const index = parts.findIndex((p) => p.type === type);
  const next = index >= 0 ? parts[index + 1] : undefined;
  return next?.type === "literal" ? next.value : undefined;
}

/** Derive a culture from an Intl locale tag, falling back to invariant symbols. */
export function cultureFromLocale(locale: string): DurationCulture {
  const numberParts = new Intl.NumberFormat(locale, { useGrouping: true }).formatToParts(-1234567.5);
  const infinity = numberPart(new Intl.NumberFormat(locale).formatToParts(Infinity), "infinity");
  const negativeSign = numberPart(numberParts, "minusSign") ?? INVARIANT_CULTURE.negativeSign;

  const timeParts = new Intl.DateTimeFormat(locale, {
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
    timeZone: "UTC",
  }).formatToParts(new Date(0));
  const dateParts = new Intl.DateTimeFormat(locale, {
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    timeZone: "UTC",
  }).formatToParts(new Date(0));

  return Object.freeze({
    positiveInfinitySymbol: infinity ?? INVARIANT_CULTURE.positiveInfinitySymbol,
    negativeInfinitySymbol: infinity != null ? `${negativeSign}${infinity}` : INVARIANT_CULTURE.negativeInfinitySymbol,
    negativeSign,
    numberGroupSeparator: numberPart(numberParts, "group") ?? INVARIANT_CULTURE.numberGroupSeparator,
    numberDecimalSeparator: numberPart(numberParts, "decimal") ?? INVARIANT_CULTURE.numberDecimalSeparator,
    timeSeparator: literalAfter(timeParts, "hour") ?? INVARIANT_CULTURE.timeSeparator,
    dateSeparator: literalAfter(dateParts, dateParts[0]?.type ?? "day") ?? INVARIANT_CULTURE.dateSeparator,
  });
}
