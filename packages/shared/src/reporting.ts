/**
 * Expense Reporting
 *
 * Month totals, per-month detail and CSV export over stored records.
 */

import { stringify } from 'csv-stringify/sync';
import type { ExpenseRecord, MonthlyExpenseRow, MonthlyTotal } from './types';
import { formatIls, isIsoCalendarDate } from './extractors';

export const CSV_COLUMNS = [
  'id',
  'filename',
  'doc_date',
  'amount_ils',
  'vendor',
  'category',
  'notes',
  'created_at',
  'month',
] as const;

const UTF8_BOM = '\uFEFF';

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * YYYY-MM of a record's document date, or null when the date is unusable.
 */
export function monthOf(docDate: string): string | null {
  return isIsoCalendarDate(docDate) ? docDate.slice(0, 7) : null;
}

/**
 * Records in display order: document date, then id.
 */
export function sortExpenses(records: ExpenseRecord[]): ExpenseRecord[] {
  return [...records].sort((a, b) => {
    if (a.doc_date !== b.doc_date) return a.doc_date < b.doc_date ? -1 : 1;
    return a.id - b.id;
  });
}

/**
 * Sum amounts per month, ascending by month. Records without a usable date
 * are left out.
 */
export function summarizeByMonth(records: ExpenseRecord[]): MonthlyTotal[] {
  const totals = new Map<string, { total: number; count: number }>();

  for (const record of records) {
    const month = monthOf(record.doc_date);
    if (!month) continue;

    const entry = totals.get(month) ?? { total: 0, count: 0 };
    entry.total += record.amount_ils;
    entry.count += 1;
    totals.set(month, entry);
  }

  return Array.from(totals.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([month, { total, count }]) => {
      const rounded = roundCents(total);
      return { month, total: rounded, formatted: formatIls(rounded), count };
    });
}

/**
 * Records of one month (YYYY-MM) with display amounts.
 */
export function expensesForMonth(records: ExpenseRecord[], month: string): MonthlyExpenseRow[] {
  return sortExpenses(records)
    .filter((record) => monthOf(record.doc_date) === month)
    .map((record) => ({
      ...record,
      month,
      formatted_amount: formatIls(record.amount_ils),
    }));
}

export function grandTotal(months: MonthlyTotal[]): number {
  return roundCents(months.reduce((sum, month) => sum + month.total, 0));
}

/**
 * CSV of every record with a usable date plus its derived month, UTF-8
 * with a BOM so spreadsheet tools pick up the Hebrew text.
 */
export function toCsv(records: ExpenseRecord[]): string {
  const rows = sortExpenses(records).flatMap((record) => {
    const month = monthOf(record.doc_date);
    return month ? [{ ...record, month }] : [];
  });

  return UTF8_BOM + stringify(rows, { header: true, columns: [...CSV_COLUMNS] });
}
