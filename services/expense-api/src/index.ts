/**
 * Expense API server
 */

import { logger, config } from '@expense-tracker/shared';
import { createApp } from './app';
import { createPool, PgExpenseRepository } from './lib/db';

const pool = createPool();
const app = createApp({ repository: new PgExpenseRepository(pool) });
const port = parseInt(process.env.PORT || String(config.port), 10);

// Start server
const server = app.listen(port, () => {
  logger.info('Expense API started', { port });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await pool.end();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
