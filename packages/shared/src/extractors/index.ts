/**
 * Field Extraction
 *
 * Runs the date, amount and vendor extractors over one document's text.
 * The three are independent: absence or failure in one never affects the
 * others.
 */

import type { ExtractionGuess, FieldCandidate } from '../types';
import { dateExtractor } from './date';
import { amountExtractor } from './amount';
import { vendorExtractor } from './vendor';

export const EMPTY_GUESS: ExtractionGuess = Object.freeze({
  guessDate: null,
  guessAmount: null,
  guessVendor: '',
});

export interface FieldExplanation {
  guess: ExtractionGuess;
  /** The candidate each guess came from */
  chosen: {
    date: FieldCandidate | null;
    amount: FieldCandidate | null;
    vendor: FieldCandidate | null;
  };
  /** Every candidate considered, per field */
  candidates: {
    date: FieldCandidate[];
    amount: FieldCandidate[];
    vendor: FieldCandidate[];
  };
}

/**
 * Extract guesses plus the candidates behind them.
 */
export function explainFields(text: string): FieldExplanation {
  const date = dateExtractor.extract(text);
  const amount = amountExtractor.extract(text);
  const vendor = vendorExtractor.extract(text);

  return {
    guess: {
      guessDate: date.value,
      guessAmount: amount.value,
      guessVendor: vendor.value,
    },
    chosen: {
      date: date.candidate,
      amount: amount.candidate,
      vendor: vendor.candidate,
    },
    candidates: {
      date: date.candidates,
      amount: amount.candidates,
      vendor: vendor.candidates,
    },
  };
}

/**
 * Best-effort date, amount and vendor for one document.
 */
export function extractFields(text: string): ExtractionGuess {
  return explainFields(text).guess;
}

// Types
export type {
  FieldRule,
  FieldExtractor,
  FieldExtractorResult,
  DateParseOptions,
} from './types';

// Base class
export { BaseFieldExtractor } from './base-extractor';

// Pattern library
export {
  RegexRule,
  DATE_RULES,
  AMOUNT_RULES,
  VENDOR_RULES,
  DAY_FIRST_DATE_PATTERN,
  YEAR_FIRST_DATE_PATTERN,
  TOTAL_PAYABLE_PATTERN,
  TOTAL_INCLUDING_VAT_PATTERN,
  SHEKEL_AMOUNT_PATTERN,
  SUPPLIER_NAME_PATTERN,
  SUPPLIER_PATTERN,
  ADDRESSEE_PATTERN,
} from './patterns';

// Normalizer
export {
  normalizeAmount,
  parseDocumentDate,
  toIsoDate,
  isIsoCalendarDate,
  formatIls,
  DEFAULT_DATE_PARSE_OPTIONS,
} from './normalizer';

// Extractors
export { DateFieldExtractor, dateExtractor } from './date';
export { AmountFieldExtractor, amountExtractor } from './amount';
export {
  VendorFieldExtractor,
  vendorExtractor,
  truncate,
  collapseWhitespace,
  FIRST_LINE_RULE,
} from './vendor';
