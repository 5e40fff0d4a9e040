/**
 * Error Types
 */

export class ExpenseTrackerError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The uploaded bytes are not a readable PDF. Callers degrade to manual entry.
 */
export class DocumentParseError extends ExpenseTrackerError {
  constructor(message: string, options?: ErrorOptions) {
    super('document_parse_error', message, options);
  }
}

/**
 * Submitted expense data was rejected before reaching the store.
 */
export class ValidationError extends ExpenseTrackerError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super('validation_failed', message);
    this.details = details;
  }
}

export class NotFoundError extends ExpenseTrackerError {
  constructor(message: string) {
    super('not_found', message);
  }
}
