/**
 * Shared Types
 *
 * Documents, extraction guesses and expense records as they move from an
 * upload through field extraction into the record store.
 */

// ============================================================================
// Documents
// ============================================================================

/**
 * Only PDFs are eligible for automatic extraction; images always arrive with
 * empty text and are filled in by hand.
 */
export type DocumentKind = 'pdf' | 'image';

export interface RawDocument {
  bytes: Uint8Array;
  filename: string;
  kind: DocumentKind;
}

export interface PageText {
  pageNumber: number;
  text: string;
}

// ============================================================================
// Field Extraction
// ============================================================================

export type FieldKind = 'date' | 'amount' | 'vendor';

/**
 * A raw pattern match for one field, before normalization.
 * `priority` is the originating rule's position in its rule list (0 = highest).
 */
export interface FieldCandidate {
  field: FieldKind;
  raw: string;
  priority: number;
  rule: string;
}

export interface ExtractionGuess {
  /** YYYY-MM-DD, or null when no date survived */
  guessDate: string | null;
  /** Non-negative amount in ILS, or null */
  guessAmount: number | null;
  /** Vendor name, empty when nothing was found */
  guessVendor: string;
}

export interface DocumentAnalysis {
  filename: string;
  kind: DocumentKind;
  extractedText: string;
  /** False when the PDF could not be parsed and extraction degraded to manual entry */
  textAvailable: boolean;
  guess: ExtractionGuess;
}

// ============================================================================
// Expense Records
// ============================================================================

export const CATEGORIES = [
  'לא משויך',
  'פרסום ושיווק',
  'ציוד משרדי',
  'תוכנות ומנויים',
  'נסיעות וחניה',
  'אירוח וקפה',
  'שירותים מקצועיים',
  'תקשורת ואינטרנט',
  'אחר',
] as const;

export type Category = (typeof CATEGORIES)[number];

export const DEFAULT_CATEGORY: Category = CATEGORIES[0];

export function isCategory(value: unknown): value is Category {
  return typeof value === 'string' && CATEGORIES.some((category) => category === value);
}

/**
 * Expense as confirmed by a human, after validation.
 */
export interface ExpenseInput {
  filename: string;
  doc_date: string;
  amount_ils: number;
  vendor: string;
  category: Category;
  notes: string;
}

export interface ExpenseRecord extends ExpenseInput {
  id: number;
  created_at: string;
}

// ============================================================================
// Reporting
// ============================================================================

export interface MonthlyTotal {
  /** YYYY-MM */
  month: string;
  total: number;
  formatted: string;
  count: number;
}

export interface MonthlyExpenseRow extends ExpenseRecord {
  month: string;
  formatted_amount: string;
}

// ============================================================================
// API Types
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
    details?: string[];
    submitted?: unknown;
  };
}

export interface MonthlyReportResponse {
  items: MonthlyTotal[];
  grand_total: number;
  grand_total_formatted: string;
}
