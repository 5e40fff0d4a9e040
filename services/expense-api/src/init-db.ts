/**
 * One-time database schema setup (run when starting from scratch).
 * Runs schema/init.sql to create the expenses table and its index.
 */

import fs from 'fs';
import path from 'path';
import { logger } from '@expense-tracker/shared';
import { createPool } from './lib/db';

const pool = createPool();

async function runInitSchema(): Promise<void> {
  const client = await pool.connect();

  try {
    logger.info('Running database schema (init.sql)');

    // tsc does not copy .sql files, so dist/ reads it from src/
    const schemaPath = path.join(__dirname, '..', 'src', 'schema', 'init.sql');

    const sql = fs.readFileSync(schemaPath, 'utf-8');
    await client.query(sql);

    logger.info('Database schema complete');
  } catch (error) {
    logger.error('Schema init failed', error);
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}

runInitSchema()
  .then(() => process.exit(0))
  .catch(() => process.exit(1));
