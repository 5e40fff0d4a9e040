/**
 * Amount Field Extractor
 *
 * Rules run in strict priority order; the first rule whose match normalizes
 * to a non-negative number wins and later rules are never consulted.
 */

import { BaseFieldExtractor } from '../base-extractor';
import type { FieldExtractorResult, FieldRule } from '../types';
import type { FieldCandidate } from '../../types';
import { AMOUNT_RULES } from '../patterns';
import { normalizeAmount } from '../normalizer';

export class AmountFieldExtractor extends BaseFieldExtractor<number | null> {
  readonly field = 'amount' as const;
  readonly description = 'Highest-priority total phrase, then a bare shekel amount';

  constructor(readonly rules: readonly FieldRule[] = AMOUNT_RULES) {
    super();
  }

  protected absentValue(): number | null {
    return null;
  }

  protected extractFromText(text: string): FieldExtractorResult<number | null> {
    const candidates: FieldCandidate[] = [];

    for (const rule of this.rules) {
      const raw = rule.tryMatch(text);
      if (raw === null) continue;

      const candidate = this.toCandidate(rule, raw);
      candidates.push(candidate);

      const amount = normalizeAmount(raw);
      if (amount !== null && amount >= 0) {
        return { value: amount, candidate, candidates };
      }
    }

    return this.absent(candidates);
  }
}

export const amountExtractor = new AmountFieldExtractor();
