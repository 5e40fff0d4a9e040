/**
 * Expense Input Validation Tests
 */

import { parseExpenseInput, validateExpenseInput, ValidationError } from '@expense-tracker/shared';

function validationDetails(data: unknown): string[] {
  try {
    parseExpenseInput(data);
  } catch (error) {
    if (error instanceof ValidationError) return error.details;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('parseExpenseInput', () => {
  it('applies defaults to a minimal expense', () => {
    expect(parseExpenseInput({ doc_date: '2024-01-03', amount_ils: 12.5 })).toEqual({
      filename: '',
      doc_date: '2024-01-03',
      amount_ils: 12.5,
      vendor: '',
      category: 'לא משויך',
      notes: '',
    });
  });

  it('keeps supplied fields and trims the vendor', () => {
    expect(
      parseExpenseInput({
        filename: 'invoice.pdf',
        doc_date: '2024-02-29',
        amount_ils: 0,
        vendor: '  Acme  ',
        category: 'אירוח וקפה',
        notes: 'team lunch',
      })
    ).toEqual({
      filename: 'invoice.pdf',
      doc_date: '2024-02-29',
      amount_ils: 0,
      vendor: 'Acme',
      category: 'אירוח וקפה',
      notes: 'team lunch',
    });
  });

  it('requires a document date', () => {
    expect(validationDetails({ amount_ils: 10 })).toEqual(['doc_date is required (YYYY-MM-DD)']);
    expect(validationDetails({ doc_date: '', amount_ils: 10 })).toEqual([
      'doc_date is required (YYYY-MM-DD)',
    ]);
    expect(validationDetails({ doc_date: null, amount_ils: 10 })).toEqual([
      'doc_date is required (YYYY-MM-DD)',
    ]);
    expect(validationDetails(null)).toEqual(['doc_date is required (YYYY-MM-DD)']);
  });

  it('rejects dates that are not calendar days', () => {
    expect(validationDetails({ doc_date: '2024-13-01', amount_ils: 10 })).toEqual([
      '/doc_date: must match format "date"',
    ]);
    expect(validationDetails({ doc_date: '03.01.2024', amount_ils: 10 })).toEqual([
      '/doc_date: must match format "date"',
    ]);
  });

  it('rejects negative and non-numeric amounts', () => {
    expect(validationDetails({ doc_date: '2024-01-03', amount_ils: -1 })).toEqual([
      '/amount_ils: must be >= 0',
    ]);
    expect(validationDetails({ doc_date: '2024-01-03', amount_ils: '12' })).toEqual([
      '/amount_ils: must be number',
    ]);
  });

  it('rejects unknown categories', () => {
    expect(validationDetails({ doc_date: '2024-01-03', amount_ils: 1, category: 'food' })).toEqual([
      '/category: must be equal to one of the allowed values',
    ]);
  });

  it('reports every problem at once', () => {
    const details = validationDetails({ doc_date: '2024-01-03', amount_ils: -1, category: 'food' });

    expect(details).toHaveLength(2);
    expect(details).toEqual(
      expect.arrayContaining([
        '/amount_ils: must be >= 0',
        '/category: must be equal to one of the allowed values',
      ])
    );
  });

  it('throws with the validation_failed code', () => {
    let caught: unknown;
    try {
      parseExpenseInput({ doc_date: 'x', amount_ils: 1 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ code: 'validation_failed', message: 'Expense input is invalid' });
  });
});

describe('validateExpenseInput', () => {
  it('reports valid input', () => {
    expect(validateExpenseInput({ doc_date: '2024-01-03', amount_ils: 1 })).toEqual({ valid: true });
  });

  it('lists errors for invalid input', () => {
    expect(validateExpenseInput({ doc_date: '2024-01-03' })).toEqual({
      valid: false,
      errors: ["/: must have required property 'amount_ils'"],
    });
  });
});
