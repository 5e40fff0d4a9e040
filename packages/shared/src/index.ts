/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Errors
export {
  ExpenseTrackerError,
  DocumentParseError,
  ValidationError,
  NotFoundError,
} from './errors';

// Types
export * from './types';

// Metrics
export {
  register,
  documentsAnalyzedCounter,
  documentParseFailuresCounter,
  extractionDurationHistogram,
  fieldExtractionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validateExpenseInput,
  parseExpenseInput,
  type ValidationResult,
} from './schemas';

// PDF text extraction
export {
  extractTextFromPdf,
  buildPageText,
  pdfjsLoader,
  type PdfLoader,
  type PdfPageSource,
  type PdfTextResult,
  type PdfTextOptions,
  type PositionedText,
} from './pdf';

// Upload analysis
export {
  analyzeDocument,
  detectDocumentKind,
  SUPPORTED_EXTENSIONS,
  type AnalyzeOptions,
} from './pipeline';

// Reporting
export {
  summarizeByMonth,
  expensesForMonth,
  grandTotal,
  sortExpenses,
  monthOf,
  toCsv,
  CSV_COLUMNS,
} from './reporting';

// Field extraction
export {
  // Types
  type FieldRule,
  type FieldExtractor,
  type FieldExtractorResult,
  type DateParseOptions,
  type FieldExplanation,
  // Base class
  BaseFieldExtractor,
  // Entry points
  extractFields,
  explainFields,
  EMPTY_GUESS,
  // Pattern library
  RegexRule,
  DATE_RULES,
  AMOUNT_RULES,
  VENDOR_RULES,
  DAY_FIRST_DATE_PATTERN,
  YEAR_FIRST_DATE_PATTERN,
  TOTAL_PAYABLE_PATTERN,
  TOTAL_INCLUDING_VAT_PATTERN,
  SHEKEL_AMOUNT_PATTERN,
  SUPPLIER_NAME_PATTERN,
  SUPPLIER_PATTERN,
  ADDRESSEE_PATTERN,
  // Normalizer
  normalizeAmount,
  parseDocumentDate,
  toIsoDate,
  isIsoCalendarDate,
  formatIls,
  DEFAULT_DATE_PARSE_OPTIONS,
  // Extractors
  DateFieldExtractor,
  dateExtractor,
  AmountFieldExtractor,
  amountExtractor,
  VendorFieldExtractor,
  vendorExtractor,
  truncate,
  collapseWhitespace,
  FIRST_LINE_RULE,
} from './extractors';
