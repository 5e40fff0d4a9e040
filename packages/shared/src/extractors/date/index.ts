/**
 * Date Field Extractor
 *
 * Invoices usually carry several dates (issue, due, print time). Every
 * numeric date from both date rules is collected, spurious years dropped,
 * and the earliest one, normally the issue date, is chosen.
 */

import { BaseFieldExtractor } from '../base-extractor';
import type { FieldExtractorResult, FieldRule, DateParseOptions } from '../types';
import type { FieldCandidate } from '../../types';
import { DATE_RULES } from '../patterns';
import { DEFAULT_DATE_PARSE_OPTIONS, parseDocumentDate, toIsoDate } from '../normalizer';

export class DateFieldExtractor extends BaseFieldExtractor<string | null> {
  readonly field = 'date' as const;
  readonly description = 'Earliest in-range numeric date, day-first';

  constructor(
    readonly rules: readonly FieldRule[] = DATE_RULES,
    private readonly options: DateParseOptions = DEFAULT_DATE_PARSE_OPTIONS
  ) {
    super();
  }

  protected absentValue(): string | null {
    return null;
  }

  protected extractFromText(text: string): FieldExtractorResult<string | null> {
    const candidates: FieldCandidate[] = this.rules.flatMap((rule) =>
      rule.matchAll(text).map((raw) => this.toCandidate(rule, raw))
    );

    let earliest: { date: Date; candidate: FieldCandidate } | null = null;

    for (const candidate of candidates) {
      const date = parseDocumentDate(candidate.raw, this.options);
      if (!date) continue;

      if (!earliest || date.getTime() < earliest.date.getTime()) {
        earliest = { date, candidate };
      }
    }

    if (!earliest) return this.absent(candidates);

    return {
      value: toIsoDate(earliest.date),
      candidate: earliest.candidate,
      candidates,
    };
  }
}

export const dateExtractor = new DateFieldExtractor();
