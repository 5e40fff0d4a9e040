/**
 * Normalizer
 *
 * Turns raw matched text into canonical values: decimal amounts and
 * YYYY-MM-DD dates. Noisy PDF text makes a failed parse an expected outcome,
 * so these return null instead of throwing.
 */

import { format, getYear, isValid, parse } from 'date-fns';
import { config } from '../config';
import type { DateParseOptions } from './types';

export const DEFAULT_DATE_PARSE_OPTIONS: DateParseOptions = {
  preferDayFirst: true,
  ignoreSurroundingText: true,
  acceptedYearRange: [config.minDocumentYear, config.maxDocumentYear],
};

const DATE_TOKEN_PATTERN = /\d{1,4}[./-]\d{1,2}[./-]\d{1,4}/;
const DATE_SEPARATOR_PATTERN = /[./-]/;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
// Plain decimals only; Number() would also take hex, binary and exponents
const DECIMAL_PATTERN = /^\d+(\.\d*)?$|^\.\d+$/;

/**
 * Strip thousands separators and parse as a decimal.
 * "1,234.56" -> 1234.56, "abc" -> null
 */
export function normalizeAmount(raw: string): number | null {
  const cleaned = raw.replace(/,/g, '').trim();
  if (!DECIMAL_PATTERN.test(cleaned)) return null;

  const amount = Number(cleaned);
  return Number.isFinite(amount) ? amount : null;
}

/**
 * date-fns formats to try for a numeric date, most likely reading first.
 */
function candidateFormats(parts: string[], preferDayFirst: boolean): string[] {
  if (parts[0].length > 2) {
    return ['yyyy.M.d', 'yyyy.d.M'];
  }

  const year = parts[2].length <= 2 ? 'yy' : 'yyyy';
  const dayFirst = `d.M.${year}`;
  const monthFirst = `M.d.${year}`;
  return preferDayFirst ? [dayFirst, monthFirst] : [monthFirst, dayFirst];
}

/**
 * Permissive numeric date parsing.
 *
 * Ambiguous day/month reads day-first; when that reading is impossible
 * (15/03 vs 03/15) the other order is tried. Two-digit years resolve to the
 * century nearest the reference date. Dates outside the accepted year range
 * are rejected.
 */
export function parseDocumentDate(
  raw: string,
  options: DateParseOptions = DEFAULT_DATE_PARSE_OPTIONS
): Date | null {
  let candidate = raw.trim();

  if (options.ignoreSurroundingText) {
    const token = DATE_TOKEN_PATTERN.exec(candidate);
    if (!token) return null;
    candidate = token[0];
  }

  const parts = candidate.split(DATE_SEPARATOR_PATTERN);
  if (parts.length !== 3 || parts.some((part) => !/^\d+$/.test(part))) return null;

  const normalized = parts.join('.');
  const referenceDate = options.referenceDate ?? new Date();
  const [minYear, maxYear] = options.acceptedYearRange;

  for (const pattern of candidateFormats(parts, options.preferDayFirst)) {
    const parsed = parse(normalized, pattern, referenceDate);
    if (!isValid(parsed)) continue;

    const year = getYear(parsed);
    return year >= minYear && year <= maxYear ? parsed : null;
  }

  return null;
}

/**
 * Canonical calendar-date form.
 */
export function toIsoDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * True only for an exact YYYY-MM-DD string naming a real calendar day.
 */
export function isIsoCalendarDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) return false;
  return isValid(parse(value, 'yyyy-MM-dd', new Date()));
}

const groupedNumber = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
  useGrouping: true,
});

/**
 * Display an amount in shekels with '.' grouping and ',' decimals:
 * 1234.5 -> "₪1.234,50". Invalid input yields ''.
 */
export function formatIls(amount: number | null | undefined): string {
  if (typeof amount !== 'number' || !Number.isFinite(amount)) return '';

  const swapped = groupedNumber
    .format(amount)
    .replace(/,/g, 'X')
    .replace(/\./g, ',')
    .replace(/X/g, '.');

  return `₪${swapped}`;
}
