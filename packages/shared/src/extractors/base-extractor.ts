/**
 * Base Field Extractor
 *
 * Abstract base class providing the common run loop for field extractors:
 * timing, logging, outcome metrics, and degrading to "absent" when a rule
 * implementation throws.
 */

import type { FieldKind, FieldCandidate } from '../types';
import type { FieldExtractor, FieldExtractorResult, FieldRule } from './types';
import { fieldExtractionsCounter } from '../metrics';
import { logger } from '../logger';

export abstract class BaseFieldExtractor<T> implements FieldExtractor<T> {
  abstract readonly field: FieldKind;
  abstract readonly description: string;
  abstract readonly rules: readonly FieldRule[];

  /**
   * The value reported when nothing usable was found.
   */
  protected abstract absentValue(): T;

  /**
   * Field-specific extraction over non-empty text.
   */
  protected abstract extractFromText(text: string): FieldExtractorResult<T>;

  /**
   * Extract this field from document text.
   * Never throws: failures are logged and reported as absence so one field
   * cannot block the others.
   */
  extract(text: string): FieldExtractorResult<T> {
    const startTime = Date.now();

    if (!text) {
      fieldExtractionsCounter.inc({ field: this.field, outcome: 'absent' });
      return this.absent();
    }

    try {
      const result = this.extractFromText(text);
      const outcome = result.candidate ? 'found' : 'absent';
      fieldExtractionsCounter.inc({ field: this.field, outcome });

      logger.debug('Field extraction complete', {
        field: this.field,
        outcome,
        rule: result.candidate?.rule,
        candidate_count: result.candidates.length,
        duration_ms: Date.now() - startTime,
      });

      return result;
    } catch (error) {
      fieldExtractionsCounter.inc({ field: this.field, outcome: 'error' });
      logger.error('Field extraction failed', error, { field: this.field });
      return this.absent();
    }
  }

  protected absent(candidates: FieldCandidate[] = []): FieldExtractorResult<T> {
    return { value: this.absentValue(), candidate: null, candidates };
  }

  protected toCandidate(rule: FieldRule, raw: string): FieldCandidate {
    return { field: this.field, raw, priority: rule.priority, rule: rule.name };
  }
}
