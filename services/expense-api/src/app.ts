/**
 * Expense API
 *
 * Upload analysis, expense CRUD, monthly reports and CSV export.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  runWithContextAsync,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  analyzeDocument,
  detectDocumentKind,
  parseExpenseInput,
  summarizeByMonth,
  expensesForMonth,
  grandTotal,
  formatIls,
  toCsv,
  ValidationError,
  NotFoundError,
  CATEGORIES,
  type ErrorEnvelope,
  type MonthlyReportResponse,
  type PdfLoader,
} from '@expense-tracker/shared';
import type { ExpenseRepository } from './lib/repository';

export interface AppDependencies {
  repository: ExpenseRepository;
  /** Overrides the pdfjs-backed loader */
  pdfLoader?: PdfLoader;
}

const MONTH_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

function correlationIdOf(res: Response): string {
  const value = res.getHeader('X-Correlation-Id');
  return typeof value === 'string' ? value : '';
}

function sendError(
  res: Response,
  status: number,
  code: string,
  message: string,
  extra: { details?: string[]; submitted?: unknown } = {}
): void {
  const body: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: correlationIdOf(res),
      ...extra,
    },
  };
  res.status(status).json(body);
}

/**
 * Map an error to its HTTP response. Validation failures echo the submitted
 * values so the client can re-populate its form.
 */
function handleError(res: Response, error: unknown, message: string, submitted?: unknown): void {
  if (error instanceof ValidationError) {
    sendError(res, 400, error.code, error.message, { details: error.details, submitted });
    return;
  }

  if (error instanceof NotFoundError) {
    sendError(res, 404, error.code, error.message);
    return;
  }

  logger.error(message, error);
  sendError(res, 500, 'internal_error', message);
}

/**
 * Positive integer id from the route.
 */
function parseId(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid expense id: ${value}`, ['id must be a positive integer']);
  }
  return id;
}

/**
 * Filename from the X-Filename header (URL-encoded allowed) or ?filename=.
 */
function uploadFilename(req: Request): string {
  const fromQuery = typeof req.query.filename === 'string' ? req.query.filename : '';
  const raw = req.header('x-filename') || fromQuery;

  try {
    return decodeURIComponent(raw).trim();
  } catch {
    // malformed percent-escapes: take the header as sent
    return raw.trim();
  }
}

function hasErrorType(err: unknown, type: string): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === type;
}

export function createApp(deps: AppDependencies): Express {
  const { repository } = deps;
  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.header('x-correlation-id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  app.use(express.json({ limit: '1mb' }));

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', async (_req: Request, res: Response) => {
    try {
      await repository.ping();

      res.json({
        status: 'healthy',
        service: 'expense-api',
        database: 'connected',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'expense-api',
        database: 'disconnected',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (_req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  app.get('/categories', (_req: Request, res: Response) => {
    res.json({ items: CATEGORIES });
  });

  /**
   * POST /documents/analyze
   * Raw document bytes in the body; returns pre-filled guesses for the
   * expense form. Unreadable PDFs come back with empty guesses.
   */
  app.post(
    '/documents/analyze',
    express.raw({ type: () => true, limit: config.maxUploadBytes }),
    async (req: Request, res: Response) => {
      const filename = uploadFilename(req);

      try {
        if (!filename) {
          throw new ValidationError('Missing filename', ['X-Filename header is required']);
        }

        const kind = detectDocumentKind(filename);
        const bytes = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

        const analysis = await runWithContextAsync({ filename }, () =>
          analyzeDocument({ bytes, filename, kind }, { pdfLoader: deps.pdfLoader })
        );

        res.json(analysis);
      } catch (error) {
        handleError(res, error, 'Failed to analyze document', { filename });
      }
    }
  );

  /**
   * GET /expenses
   * All expenses by document date, then id
   */
  app.get('/expenses', async (_req: Request, res: Response) => {
    try {
      res.json({ items: await repository.list() });
    } catch (error) {
      handleError(res, error, 'Failed to list expenses');
    }
  });

  app.get('/expenses/:id', async (req: Request, res: Response) => {
    try {
      const id = parseId(req.params.id);
      const record = await repository.getById(id);

      if (!record) {
        throw new NotFoundError(`Expense ${id} not found`);
      }

      res.json(record);
    } catch (error) {
      handleError(res, error, 'Failed to retrieve expense');
    }
  });

  /**
   * POST /expenses
   * Store a confirmed expense
   */
  app.post('/expenses', async (req: Request, res: Response) => {
    try {
      const input = parseExpenseInput(req.body);
      const record = await runWithContextAsync({ filename: input.filename }, () =>
        repository.insert(input)
      );

      res.status(201).json(record);
    } catch (error) {
      handleError(res, error, 'Failed to save expense', req.body);
    }
  });

  /**
   * PUT /expenses/:id
   * Replace the editable fields of an expense
   */
  app.put('/expenses/:id', async (req: Request, res: Response) => {
    try {
      const id = parseId(req.params.id);
      const input = parseExpenseInput(req.body);
      const record = await runWithContextAsync({ expenseId: id }, () =>
        repository.update(id, input)
      );

      if (!record) {
        throw new NotFoundError(`Expense ${id} not found`);
      }

      res.json(record);
    } catch (error) {
      handleError(res, error, 'Failed to update expense', req.body);
    }
  });

  app.delete('/expenses/:id', async (req: Request, res: Response) => {
    try {
      const id = parseId(req.params.id);
      const deleted = await runWithContextAsync({ expenseId: id }, () => repository.delete(id));

      if (!deleted) {
        throw new NotFoundError(`Expense ${id} not found`);
      }

      res.status(204).end();
    } catch (error) {
      handleError(res, error, 'Failed to delete expense');
    }
  });

  /**
   * GET /reports/monthly
   * Totals per month, ascending
   */
  app.get('/reports/monthly', async (_req: Request, res: Response) => {
    try {
      const items = summarizeByMonth(await repository.list());
      const total = grandTotal(items);

      const response: MonthlyReportResponse = {
        items,
        grand_total: total,
        grand_total_formatted: formatIls(total),
      };
      res.json(response);
    } catch (error) {
      handleError(res, error, 'Failed to build monthly report');
    }
  });

  /**
   * GET /reports/monthly/:month
   * Expenses of one YYYY-MM month
   */
  app.get('/reports/monthly/:month', async (req: Request, res: Response) => {
    try {
      const { month } = req.params;
      if (!MONTH_PATTERN.test(month)) {
        throw new ValidationError(`Invalid month: ${month}`, ['month must be YYYY-MM']);
      }

      const items = expensesForMonth(await repository.list(), month);
      const total = Math.round(items.reduce((sum, item) => sum + item.amount_ils, 0) * 100) / 100;

      res.json({ month, items, total, formatted: formatIls(total) });
    } catch (error) {
      handleError(res, error, 'Failed to build month detail');
    }
  });

  /**
   * GET /exports/expenses.csv
   */
  app.get('/exports/expenses.csv', async (_req: Request, res: Response) => {
    try {
      const csv = toCsv(await repository.list());

      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', 'attachment; filename="expenses_export.csv"');
      res.send(csv);
    } catch (error) {
      handleError(res, error, 'Failed to export expenses');
    }
  });

  // Unknown routes
  app.use((req: Request, res: Response) => {
    sendError(res, 404, 'not_found', `No route for ${req.method} ${req.path}`);
  });

  // Body parser failures
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (hasErrorType(err, 'entity.parse.failed')) {
      sendError(res, 400, 'invalid_request', 'Request body is not valid JSON');
      return;
    }

    if (hasErrorType(err, 'entity.too.large')) {
      sendError(res, 413, 'payload_too_large', 'Request body is too large');
      return;
    }

    logger.error('Unhandled request error', err);
    sendError(res, 500, 'internal_error', 'Unexpected error');
  });

  return app;
}
