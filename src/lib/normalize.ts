import { format, isValid, parse } from "date-fns";
import Decimal from "decimal.js";

import { NormalizationError } from "@/lib/errors";
import type { IsoDate } from "@/lib/funds";

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: NormalizationError };

export type DateOrder = "MDY" | "DMY";

export const AMOUNT_SCALE = 2;

const CURRENCY_SYMBOLS = /[$€£¥₩]/g;
const CURRENCY_CODES = /\b(?:USD|EUR|GBP|JPY|KRW|CHF|CAD|AUD)\b/gi;
const MAGNITUDE_SUFFIX = /\d\s*(?:k|m|mm|mn|b|bn|thousands?|millions?|billions?)\b/i;
const GROUPED_NUMBER = /^(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?$/;
const FRACTION_ONLY = /^\.\d+$/;

function fail<T>(message: string, raw: string): ParseResult<T> {
  return { ok: false, error: new NormalizationError(message, raw) };
}

/**
 * Parses a currency amount as printed in fund statements.
 *
 * Accepts currency symbols and codes, well-formed thousands separators, a leading minus and
 * accounting parentheses. Abbreviated magnitudes ("1.2M", "500K") are rejected, never scaled.
 */
export function parseAmount(raw: string): ParseResult<Decimal> {
  const input = (raw ?? "").trim();
  if (!input) return fail("Empty amount", raw ?? "");
  if (MAGNITUDE_SUFFIX.test(input)) return fail("Abbreviated magnitude is not accepted", input);

  let text = input
    .replace(/[−–]/g, "-")
    .replace(CURRENCY_SYMBOLS, "")
    .replace(CURRENCY_CODES, "")
    .replace(/\s+/g, "");

  let negative = false;
  if (text.startsWith("(") && text.endsWith(")")) {
    negative = true;
    text = text.slice(1, -1);
  }
  if (text.startsWith("-")) {
    if (negative) return fail("Conflicting negative markers", input);
    negative = true;
    text = text.slice(1);
  }

  if (!GROUPED_NUMBER.test(text) && !FRACTION_ONLY.test(text)) {
    return fail("Not a numeric amount", input);
  }

  const value = new Decimal(text.replaceAll(",", "")).toDecimalPlaces(AMOUNT_SCALE, Decimal.ROUND_HALF_UP);
  return { ok: true, value: negative ? value.negated() : value };
}

const ISO_FORMATS = ["yyyy-M-d", "yyyy/M/d"];
const MDY_FORMATS = ["M/d/yyyy", "M-d-yyyy", "M.d.yyyy"];
const DMY_FORMATS = ["d/M/yyyy", "d-M-yyyy", "d.M.yyyy"];
const TEXTUAL_FORMATS = [
  "d-MMM-yyyy",
  "d-MMMM-yyyy",
  "d MMM yyyy",
  "d MMMM yyyy",
  "MMM d, yyyy",
  "MMMM d, yyyy",
  "MMM d yyyy",
  "MMMM d yyyy",
];

// Fixed so that parsing never depends on the current clock.
const REFERENCE_DATE = new Date(2000, 0, 1);

const FOUR_DIGIT_YEAR = /(?:^|\D)\d{4}(?:\D|$)/;

/** The format list tried, in order, for a given numeric date order. */
export function dateFormatPriority(order: DateOrder = "MDY"): string[] {
  const numeric = order === "DMY" ? [...DMY_FORMATS, ...MDY_FORMATS] : [...MDY_FORMATS, ...DMY_FORMATS];
  return [...ISO_FORMATS, ...numeric, ...TEXTUAL_FORMATS];
}

export function parseDate(raw: string, order: DateOrder = "MDY"): ParseResult<IsoDate> {
  const input = (raw ?? "").trim().replace(/\s+/g, " ");
  if (!input) return fail("Empty date", raw ?? "");
  if (!FOUR_DIGIT_YEAR.test(input)) return fail("Date needs a four-digit year", input);

  for (const fmt of dateFormatPriority(order)) {
    const d = parse(input, fmt, REFERENCE_DATE);
    if (isValid(d)) return { ok: true, value: format(d, "yyyy-MM-dd") };
  }
  return fail("Unrecognized date", input);
}

export function isDateLike(raw: string, order: DateOrder = "MDY"): boolean {
  return parseDate(raw, order).ok;
}

export function isAmountLike(raw: string): boolean {
  return parseAmount(raw).ok;
}

export function toFixedAmount(value: Decimal): string {
  return value.toFixed(AMOUNT_SCALE);
}

export function amountFromStored(value: unknown): Decimal {
  if (typeof value === "number" || typeof value === "string") {
    return new Decimal(value).toDecimalPlaces(AMOUNT_SCALE, Decimal.ROUND_HALF_UP);
  }
  return new Decimal(0);
}
