/**
 * PDF Text Extraction
 *
 * Extracts text from PDF uploads using pdfjs-dist, reading at most the
 * first few pages and dropping pages that carry no text.
 */

import type * as PdfJs from 'pdfjs-dist';
import { config } from './config';
import { DocumentParseError } from './errors';
import { logger } from './logger';
import type { PageText } from './types';

/**
 * A text fragment with its position on the page.
 */
export interface PositionedText {
  str: string;
  x: number;
  y: number;
}

/**
 * An opened PDF, reduced to what text extraction needs.
 */
export interface PdfPageSource {
  numPages: number;
  getPageItems(pageNumber: number): Promise<PositionedText[]>;
  close(): Promise<void>;
}

export type PdfLoader = (data: Uint8Array) => Promise<PdfPageSource>;

export interface PdfTextResult {
  /** Pages that produced text, in page order */
  pages: PageText[];
  totalPages: number;
  pagesRead: number;
  text: string;
}

export interface PdfTextOptions {
  loader?: PdfLoader;
  maxPages?: number;
}

let pdfjsLib: typeof PdfJs | null = null;

// The 2.x legacy build is the last CommonJS release and runs under Node
// without a DOM or a native canvas.
function loadPdfJs(): typeof PdfJs {
  if (!pdfjsLib) {
    const lib: typeof PdfJs = require('pdfjs-dist/legacy/build/pdf.js');
    lib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/legacy/build/pdf.worker.js');
    pdfjsLib = lib;
  }
  return pdfjsLib;
}

/**
 * Default loader backed by pdfjs-dist.
 */
export const pdfjsLoader: PdfLoader = async (data) => {
  const lib = loadPdfJs();
  // pdfjs transfers the buffer it is given, so hand it a copy.
  // verbosity 0 keeps its console warnings (missing fonts, fake worker) quiet.
  const loadingTask = lib.getDocument({
    data: new Uint8Array(data),
    isEvalSupported: false,
    verbosity: 0,
  });

  const pdf = await loadingTask.promise.catch(async (error: unknown) => {
    await loadingTask.destroy();
    throw error;
  });

  return {
    numPages: pdf.numPages,

    async getPageItems(pageNumber: number): Promise<PositionedText[]> {
      const page = await pdf.getPage(pageNumber);
      const textContent = await page.getTextContent();

      const items: PositionedText[] = [];
      for (const item of textContent.items) {
        if (!('str' in item)) continue;
        items.push({
          str: item.str,
          x: Math.round(item.transform[4]),
          y: Math.round(item.transform[5]),
        });
      }

      page.cleanup();
      return items;
    },

    close: () => pdf.destroy(),
  };
};

/**
 * Rebuild a page's lines from positioned text.
 *
 * Items sharing a (rounded) Y position form one line; lines run top to
 * bottom and items within a line left to right.
 */
export function buildPageText(items: PositionedText[]): string {
  const itemsByY = new Map<number, PositionedText[]>();

  for (const item of items) {
    if (!item.str || item.str.trim() === '') continue;

    const line = itemsByY.get(item.y);
    if (line) {
      line.push(item);
    } else {
      itemsByY.set(item.y, [item]);
    }
  }

  const sortedYPositions = Array.from(itemsByY.keys()).sort((a, b) => b - a);

  const lines: string[] = [];
  for (const y of sortedYPositions) {
    const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
    const lineText = lineItems.map((item) => item.str).join(' ').trim();
    if (lineText) {
      lines.push(lineText);
    }
  }

  return lines.join('\n');
}

/**
 * Extract text from PDF bytes.
 *
 * @throws DocumentParseError when the bytes are not a readable PDF
 */
export async function extractTextFromPdf(
  bytes: Uint8Array,
  options: PdfTextOptions = {}
): Promise<PdfTextResult> {
  const loader = options.loader ?? pdfjsLoader;
  const maxPages = options.maxPages ?? config.pdfMaxPages;

  let source: PdfPageSource;
  try {
    source = await loader(bytes);
  } catch (error) {
    throw new DocumentParseError('Unable to open PDF document', { cause: error });
  }

  const pages: PageText[] = [];
  const pagesRead = Math.min(source.numPages, maxPages);

  try {
    for (let pageNumber = 1; pageNumber <= pagesRead; pageNumber++) {
      let items: PositionedText[];
      try {
        items = await source.getPageItems(pageNumber);
      } catch (error) {
        throw new DocumentParseError(`Unable to read PDF page ${pageNumber}`, { cause: error });
      }

      const text = buildPageText(items);
      if (text.trim()) {
        pages.push({ pageNumber, text });
      }
    }
  } finally {
    // The text is already read; a failed close must not discard it
    await source.close().catch((error: unknown) => {
      logger.warn('Failed to close PDF document', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  const text = pages.map((page) => page.text).join('\n').trim();

  logger.info('PDF text extraction complete', {
    totalPages: source.numPages,
    pagesRead,
    pagesWithText: pages.length,
    totalChars: text.length,
  });

  return {
    pages,
    totalPages: source.numPages,
    pagesRead,
    text,
  };
}
