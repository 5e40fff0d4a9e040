/**
 * Field Extractor Types
 *
 * Each target field (date, amount, vendor) has its own extractor driven by
 * an ordered list of rules from the pattern library.
 */

import type { FieldKind, FieldCandidate } from '../types';

/**
 * A single recognition rule. Rules are tried in list order; `priority`
 * mirrors that position.
 */
export interface FieldRule {
  readonly name: string;
  readonly field: FieldKind;
  readonly priority: number;

  /** First match in document order, or null */
  tryMatch(text: string): string | null;

  /** Every non-overlapping match in document order */
  matchAll(text: string): string[];
}

/**
 * Outcome of running one field extractor over a text.
 */
export interface FieldExtractorResult<T> {
  value: T;
  /** The candidate the value came from; null when the field is absent */
  candidate: FieldCandidate | null;
  /** Every candidate considered, in rule order then document order */
  candidates: FieldCandidate[];
}

export interface FieldExtractor<T> {
  readonly field: FieldKind;
  readonly description: string;
  readonly rules: readonly FieldRule[];

  extract(text: string): FieldExtractorResult<T>;
}

/**
 * Permissive date-parsing options.
 */
export interface DateParseOptions {
  /** Read d/m/y when day and month are ambiguous */
  preferDayFirst: boolean;
  /** Pick the date-shaped token out of a longer string */
  ignoreSurroundingText: boolean;
  /** Inclusive year bounds; anything outside is treated as a spurious match */
  acceptedYearRange: readonly [number, number];
  /** Anchor for two-digit years; defaults to now */
  referenceDate?: Date;
}

export type { FieldKind, FieldCandidate };
