/**
 * Invoice Pattern Library
 *
 * Ordered recognition rules for the three fields pulled out of Hebrew
 * invoices and receipts. List order is priority order.
 */

import type { FieldKind } from '../types';
import type { FieldRule } from './types';

/**
 * A rule backed by a regular expression. Group 1 holds the raw value,
 * falling back to the whole match when the pattern has no group.
 */
export class RegexRule implements FieldRule {
  private readonly globalPattern: RegExp;

  constructor(
    readonly name: string,
    readonly field: FieldKind,
    readonly priority: number,
    private readonly pattern: RegExp
  ) {
    const flags = pattern.flags.replace(/[gy]/g, '');
    this.pattern = new RegExp(pattern.source, flags);
    this.globalPattern = new RegExp(pattern.source, `${flags}g`);
  }

  tryMatch(text: string): string | null {
    const match = this.pattern.exec(text);
    if (!match) return null;
    return match[1] ?? match[0];
  }

  matchAll(text: string): string[] {
    return Array.from(text.matchAll(this.globalPattern), (match) => match[1] ?? match[0]);
  }
}

function rules(field: FieldKind, entries: Array<[string, RegExp]>): readonly FieldRule[] {
  return entries.map(([name, pattern], index) => new RegexRule(name, field, index, pattern));
}

// A date must not start or end in the middle of a word, in any script.
const WORD_START = '(?<![\\p{L}\\p{N}_])';
const WORD_END = '(?![\\p{L}\\p{N}_])';

/**
 * 15/03/2024, 3.1.24, 03-01-2024
 */
export const DAY_FIRST_DATE_PATTERN = new RegExp(
  `${WORD_START}(\\d{1,2}[./-]\\d{1,2}[./-]\\d{2,4})${WORD_END}`,
  'u'
);

/**
 * 2024-03-15, 2024.3.15
 */
export const YEAR_FIRST_DATE_PATTERN = new RegExp(
  `${WORD_START}(\\d{4}[./-]\\d{1,2}[./-]\\d{1,2})${WORD_END}`,
  'u'
);

// Hebrew abbreviations are written with a plain quote, a gershayim, or nothing.
const QUOTE = '["״]?';

// Optional separator and shekel sign, then digits with optional thousands
// commas and up to two decimals.
const AMOUNT_VALUE = '\\s*[:-]?\\s*₪?\\s*([0-9][0-9,]*\\.?[0-9]{0,2})';

/** סה"כ לתשלום / סה"כ תשלום / סכום לתשלום / לתשלום */
export const TOTAL_PAYABLE_PATTERN = new RegExp(
  `(?:סה${QUOTE}כ\\s*לתשלום|סה${QUOTE}כ\\s*תשלום|סכום\\s*לתשלום|לתשלום)${AMOUNT_VALUE}`,
  'i'
);

/** סה"כ כולל מע"מ / סה"כ כולל */
export const TOTAL_INCLUDING_VAT_PATTERN = new RegExp(
  `(?:סה${QUOTE}כ\\s*כולל\\s*מע${QUOTE}מ|סה${QUOTE}כ\\s*כולל)${AMOUNT_VALUE}`,
  'i'
);

/** ₪ 1,234.50 anywhere */
export const SHEKEL_AMOUNT_PATTERN = /₪\s*([0-9][0-9,]*\.?[0-9]{0,2})/i;

const VENDOR_VALUE = '\\s*[:-]?\\s*(.+)';

/** שם ספק: */
export const SUPPLIER_NAME_PATTERN = new RegExp(`שם\\s*ספק${VENDOR_VALUE}`, 'i');

/** ספק: */
export const SUPPLIER_PATTERN = new RegExp(`ספק${VENDOR_VALUE}`, 'i');

/** לכבוד: */
export const ADDRESSEE_PATTERN = new RegExp(`לכבוד${VENDOR_VALUE}`, 'i');

/**
 * Both date styles scan the whole text; every match is a candidate.
 */
export const DATE_RULES = rules('date', [
  ['day_first_numeric', DAY_FIRST_DATE_PATTERN],
  ['year_first_numeric', YEAR_FIRST_DATE_PATTERN],
]);

/**
 * Most specific first. The first rule that matches anywhere decides the
 * amount; the order is a tunable policy, not a correctness guarantee.
 */
export const AMOUNT_RULES = rules('amount', [
  ['total_payable', TOTAL_PAYABLE_PATTERN],
  ['total_including_vat', TOTAL_INCLUDING_VAT_PATTERN],
  ['shekel_sign', SHEKEL_AMOUNT_PATTERN],
]);

export const VENDOR_RULES = rules('vendor', [
  ['supplier_name', SUPPLIER_NAME_PATTERN],
  ['supplier', SUPPLIER_PATTERN],
  ['addressee', ADDRESSEE_PATTERN],
]);
