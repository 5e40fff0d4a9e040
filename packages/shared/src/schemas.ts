/**
 * JSON Schema Validation
 *
 * Validates human-submitted expenses at the persistence boundary using Ajv.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { logger } from './logger';
import { ValidationError } from './errors';
import { DEFAULT_CATEGORY, type Category, type ExpenseInput } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});
addFormats(ajv);

/**
 * Shape accepted by the expense input schema, before defaults are applied.
 */
interface ExpenseInputPayload {
  filename?: string;
  doc_date: string;
  amount_ils: number;
  vendor?: string;
  category?: Category;
  notes?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

let expenseInputValidator: ValidateFunction<ExpenseInputPayload> | null = null;

function loadSchema(schemaName: string): SchemaObject {
  const possiblePaths = [
    // packages/shared/src and packages/shared/dist sit at the same depth
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      return JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    }
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

function getExpenseInputValidator(): ValidateFunction<ExpenseInputPayload> {
  if (!expenseInputValidator) {
    expenseInputValidator = ajv.compile<ExpenseInputPayload>(
      loadSchema('expense_input.schema.json')
    );
  }
  return expenseInputValidator;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

/**
 * Validate an expense submission against expense_input.schema.json
 */
export function validateExpenseInput(data: unknown): ValidationResult {
  const validate = getExpenseInputValidator();

  if (!validate(data)) {
    const errors = formatErrors(validate.errors);
    logger.warn('ExpenseInput validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Validate a submission and apply defaults.
 *
 * @throws ValidationError listing every problem found
 */
export function parseExpenseInput(data: unknown): ExpenseInput {
  const docDate =
    typeof data === 'object' && data !== null && 'doc_date' in data ? data.doc_date : undefined;

  if (docDate === undefined || docDate === null || docDate === '') {
    throw new ValidationError('Document date is required', ['doc_date is required (YYYY-MM-DD)']);
  }

  const validate = getExpenseInputValidator();
  if (!validate(data)) {
    const details = formatErrors(validate.errors);
    logger.warn('ExpenseInput validation failed', { errors: details });
    throw new ValidationError('Expense input is invalid', details);
  }

  return {
    filename: data.filename ?? '',
    doc_date: data.doc_date,
    amount_ils: data.amount_ils,
    vendor: (data.vendor ?? '').trim(),
    category: data.category ?? DEFAULT_CATEGORY,
    notes: data.notes ?? '',
  };
}
