/**
 * Row Mapping Tests
 */

import { toExpenseRecord, type ExpenseRow } from '../../services/expense-api/src/lib/db';
import { CREATED_AT } from './helpers';

function row(overrides: Partial<ExpenseRow> = {}): ExpenseRow {
  return {
    id: 7,
    filename: 'invoice.pdf',
    doc_date: '2024-01-03',
    amount_ils: '1500.00',
    vendor: 'חברת דוגמה בע״מ',
    category: 'ציוד משרדי',
    notes: '',
    created_at: new Date(CREATED_AT),
    ...overrides,
  };
}

describe('toExpenseRecord', () => {
  it('converts numeric and timestamp columns', () => {
    expect(toExpenseRecord(row())).toEqual({
      id: 7,
      filename: 'invoice.pdf',
      doc_date: '2024-01-03',
      amount_ils: 1500,
      vendor: 'חברת דוגמה בע״מ',
      category: 'ציוד משרדי',
      notes: '',
      created_at: CREATED_AT,
    });
  });

  it('keeps cents', () => {
    expect(toExpenseRecord(row({ amount_ils: '12.30' })).amount_ils).toBe(12.3);
  });

  it('maps an unknown stored category to the default', () => {
    expect(toExpenseRecord(row({ category: 'legacy' })).category).toBe('לא משויך');
  });
});
