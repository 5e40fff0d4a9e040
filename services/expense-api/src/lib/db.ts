/**
 * Database Operations
 *
 * Single-table expense store on PostgreSQL.
 */

import { Pool } from 'pg';
import {
  logger,
  config,
  dbQueryDurationHistogram,
  isCategory,
  DEFAULT_CATEGORY,
  type ExpenseInput,
  type ExpenseRecord,
} from '@expense-tracker/shared';
import type { ExpenseRepository } from './repository';

export type ExpenseRow = {
  id: number;
  filename: string;
  doc_date: string;
  amount_ils: string;
  vendor: string;
  category: string;
  notes: string;
  created_at: Date;
};

// doc_date is rendered by the database so no timezone shift can move the day
const EXPENSE_COLUMNS = `id, filename, to_char(doc_date, 'YYYY-MM-DD') AS doc_date,
  amount_ils, vendor, category, notes, created_at`;

export function createPool(): Pool {
  return new Pool({
    connectionString: process.env.DATABASE_URL || config.databaseUrl,
    max: config.pgPoolMax,
    idleTimeoutMillis: config.pgIdleTimeoutMs,
  });
}

/** Map a database row to the API record shape. */
export function toExpenseRecord(row: ExpenseRow): ExpenseRecord {
  return {
    id: row.id,
    filename: row.filename,
    doc_date: row.doc_date,
    amount_ils: Number(row.amount_ils),
    vendor: row.vendor,
    category: isCategory(row.category) ? row.category : DEFAULT_CATEGORY,
    notes: row.notes,
    created_at: row.created_at.toISOString(),
  };
}

export class PgExpenseRepository implements ExpenseRepository {
  constructor(private readonly pool: Pool) {}

  private async timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const endTimer = dbQueryDurationHistogram.startTimer({ operation });
    try {
      return await fn();
    } catch (error) {
      logger.error('Database query failed', error, { operation });
      throw error;
    } finally {
      endTimer();
    }
  }

  async insert(input: ExpenseInput): Promise<ExpenseRecord> {
    return this.timed('insert_expense', async () => {
      const result = await this.pool.query<ExpenseRow>(
        `INSERT INTO expenses (filename, doc_date, amount_ils, vendor, category, notes)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING ${EXPENSE_COLUMNS}`,
        [input.filename, input.doc_date, input.amount_ils, input.vendor, input.category, input.notes]
      );

      const record = toExpenseRecord(result.rows[0]);
      logger.info('Expense inserted', { expense_id: record.id });
      return record;
    });
  }

  async update(id: number, input: ExpenseInput): Promise<ExpenseRecord | null> {
    return this.timed('update_expense', async () => {
      const result = await this.pool.query<ExpenseRow>(
        `UPDATE expenses
         SET doc_date = $1, amount_ils = $2, vendor = $3, category = $4, notes = $5
         WHERE id = $6
         RETURNING ${EXPENSE_COLUMNS}`,
        [input.doc_date, input.amount_ils, input.vendor, input.category, input.notes, id]
      );

      if (result.rows.length === 0) return null;

      logger.info('Expense updated', { expense_id: id });
      return toExpenseRecord(result.rows[0]);
    });
  }

  async delete(id: number): Promise<boolean> {
    return this.timed('delete_expense', async () => {
      const result = await this.pool.query('DELETE FROM expenses WHERE id = $1', [id]);
      const deleted = (result.rowCount ?? 0) > 0;

      if (deleted) {
        logger.info('Expense deleted', { expense_id: id });
      }
      return deleted;
    });
  }

  async getById(id: number): Promise<ExpenseRecord | null> {
    return this.timed('get_expense', async () => {
      const result = await this.pool.query<ExpenseRow>(
        `SELECT ${EXPENSE_COLUMNS} FROM expenses WHERE id = $1`,
        [id]
      );
      return result.rows.length > 0 ? toExpenseRecord(result.rows[0]) : null;
    });
  }

  async list(): Promise<ExpenseRecord[]> {
    return this.timed('list_expenses', async () => {
      const result = await this.pool.query<ExpenseRow>(
        `SELECT ${EXPENSE_COLUMNS} FROM expenses ORDER BY doc_date ASC, id ASC`
      );
      return result.rows.map(toExpenseRecord);
    });
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}
