/**
 * Document Analysis Pipeline
 *
 * One upload in, pre-filled guesses out: bytes -> text -> fields. A PDF that
 * cannot be read degrades to manual entry instead of failing the upload.
 */

import path from 'node:path';
import type { DocumentAnalysis, DocumentKind, RawDocument } from './types';
import { DocumentParseError, ValidationError } from './errors';
import { extractTextFromPdf, type PdfLoader } from './pdf';
import { extractFields, EMPTY_GUESS } from './extractors';
import {
  documentsAnalyzedCounter,
  documentParseFailuresCounter,
  extractionDurationHistogram,
} from './metrics';
import { logger } from './logger';

const KIND_BY_EXTENSION: Record<string, DocumentKind> = {
  '.pdf': 'pdf',
  '.png': 'image',
  '.jpg': 'image',
  '.jpeg': 'image',
};

export const SUPPORTED_EXTENSIONS = Object.keys(KIND_BY_EXTENSION);

/**
 * Classify an upload by its filename extension.
 *
 * @throws ValidationError for anything that is neither a PDF nor a supported image
 */
export function detectDocumentKind(filename: string): DocumentKind {
  const extension = path.extname(filename).toLowerCase();
  const kind = KIND_BY_EXTENSION[extension];

  if (!kind) {
    throw new ValidationError(`Unsupported file type: ${filename || '(no filename)'}`, [
      `filename must end with one of ${SUPPORTED_EXTENSIONS.join(', ')}`,
    ]);
  }

  return kind;
}

export interface AnalyzeOptions {
  pdfLoader?: PdfLoader;
}

/**
 * Read text from a PDF, treating unreadable input as "no text".
 */
async function readDocumentText(
  doc: RawDocument,
  options: AnalyzeOptions
): Promise<{ text: string; textAvailable: boolean }> {
  if (doc.kind !== 'pdf') {
    return { text: '', textAvailable: true };
  }

  try {
    const result = await extractTextFromPdf(doc.bytes, { loader: options.pdfLoader });
    return { text: result.text, textAvailable: true };
  } catch (error) {
    if (!(error instanceof DocumentParseError)) throw error;

    documentParseFailuresCounter.inc();
    logger.warn('PDF could not be parsed, falling back to manual entry', {
      error: error.message,
      cause: error.cause instanceof Error ? error.cause.message : String(error.cause),
    });
    return { text: '', textAvailable: false };
  }
}

/**
 * Analyze one uploaded document.
 */
export async function analyzeDocument(
  doc: RawDocument,
  options: AnalyzeOptions = {}
): Promise<DocumentAnalysis> {
  const endTimer = extractionDurationHistogram.startTimer({ kind: doc.kind });

  try {
    const { text, textAvailable } = await readDocumentText(doc, options);
    const guess = text ? extractFields(text) : { ...EMPTY_GUESS };

    documentsAnalyzedCounter.inc({
      kind: doc.kind,
      status: textAvailable ? (text ? 'extracted' : 'no_text') : 'parse_failed',
    });

    logger.info('Document analyzed', {
      kind: doc.kind,
      bytes: doc.bytes.length,
      text_chars: text.length,
      guess_date: guess.guessDate,
      guess_amount: guess.guessAmount,
      has_vendor: guess.guessVendor.length > 0,
    });

    return {
      filename: doc.filename,
      kind: doc.kind,
      extractedText: text,
      textAvailable,
      guess,
    };
  } finally {
    endTimer();
  }
}
