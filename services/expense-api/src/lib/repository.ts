/**
 * Expense Repository
 *
 * Storage contract for expense records. The service talks to PostgreSQL
 * through PgExpenseRepository; anything else implementing this interface
 * can stand in for it.
 */

import type { ExpenseInput, ExpenseRecord } from '@expense-tracker/shared';

export interface ExpenseRepository {
  /** Insert a confirmed expense; the store assigns id and created_at */
  insert(input: ExpenseInput): Promise<ExpenseRecord>;

  /** Update every editable field except filename; null when the id is unknown */
  update(id: number, input: ExpenseInput): Promise<ExpenseRecord | null>;

  /** True when a record was deleted */
  delete(id: number): Promise<boolean>;

  getById(id: number): Promise<ExpenseRecord | null>;

  /** All records ordered by doc_date, then id */
  list(): Promise<ExpenseRecord[]>;

  /** Throws when the store is unreachable */
  ping(): Promise<void>;
}
