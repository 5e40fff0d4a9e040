/**
 * Prometheus Metrics
 *
 * Metrics for HTTP traffic, field extraction outcomes and the record store.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Extraction Metrics
// ============================================================================

export const documentsAnalyzedCounter = new promClient.Counter({
  name: 'expense_tracker_documents_analyzed_total',
  help: 'Total number of uploaded documents analyzed',
  labelNames: ['kind', 'status'],
  registers: [register],
});

export const documentParseFailuresCounter = new promClient.Counter({
  name: 'expense_tracker_document_parse_failures_total',
  help: 'PDF uploads that could not be parsed and fell back to manual entry',
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'expense_tracker_extraction_duration_seconds',
  help: 'Duration of text and field extraction for one document',
  labelNames: ['kind'],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  registers: [register],
});

export const fieldExtractionsCounter = new promClient.Counter({
  name: 'expense_tracker_field_extractions_total',
  help: 'Field extraction outcomes by field',
  labelNames: ['field', 'outcome'],
  registers: [register],
});

// ============================================================================
// HTTP Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'expense_tracker_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'expense_tracker_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

// ============================================================================
// Database Metrics
// ============================================================================

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'expense_tracker_db_query_duration_seconds',
  help: 'Database query duration in seconds',
  labelNames: ['operation'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [register],
});

/**
 * Get metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for metrics endpoint
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
