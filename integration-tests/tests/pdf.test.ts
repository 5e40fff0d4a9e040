/**
 * PDF Text Extraction Tests
 *
 * Page handling runs against in-memory page sources; the pdfjs loader is
 * exercised with small hand-built documents.
 */

import {
  analyzeDocument,
  buildPageText,
  extractTextFromPdf,
  pdfjsLoader,
  DocumentParseError,
} from '@expense-tracker/shared';
import {
  FakePdf,
  UnclosablePdf,
  loaderFor,
  pageFromLines,
  brokenLoader,
  minimalPdf,
} from './helpers';

const BYTES = new Uint8Array([0x25, 0x50, 0x44, 0x46]);

describe('buildPageText', () => {
  it('orders lines top to bottom and items left to right', () => {
    const text = buildPageText([
      { str: 'bottom', x: 10, y: 100 },
      { str: 'right', x: 200, y: 700 },
      { str: 'left', x: 10, y: 700 },
    ]);

    expect(text).toBe('left right\nbottom');
  });

  it('skips blank items and lines', () => {
    const text = buildPageText([
      { str: '   ', x: 10, y: 500 },
      { str: 'only line', x: 10, y: 400 },
      { str: '', x: 50, y: 400 },
    ]);

    expect(text).toBe('only line');
  });

  it('returns an empty string for a page without text', () => {
    expect(buildPageText([])).toBe('');
  });
});

describe('extractTextFromPdf', () => {
  it('reads at most five pages and closes the document', async () => {
    const pdf = new FakePdf(
      Array.from({ length: 7 }, (_, index) => pageFromLines([`page ${index + 1}`]))
    );

    const result = await extractTextFromPdf(BYTES, { loader: loaderFor(pdf) });

    expect(pdf.requestedPages).toEqual([1, 2, 3, 4, 5]);
    expect(pdf.closed).toBe(true);
    expect(result.totalPages).toBe(7);
    expect(result.pagesRead).toBe(5);
    expect(result.text).toBe('page 1\npage 2\npage 3\npage 4\npage 5');
  });

  it('honours a custom page limit', async () => {
    const pdf = new FakePdf([pageFromLines(['one']), pageFromLines(['two'])]);

    const result = await extractTextFromPdf(BYTES, { loader: loaderFor(pdf), maxPages: 1 });

    expect(pdf.requestedPages).toEqual([1]);
    expect(result.text).toBe('one');
  });

  it('drops pages that carry no text', async () => {
    const pdf = new FakePdf([pageFromLines(['first']), [], pageFromLines(['third'])]);

    const result = await extractTextFromPdf(BYTES, { loader: loaderFor(pdf) });

    expect(result.pages).toEqual([
      { pageNumber: 1, text: 'first' },
      { pageNumber: 3, text: 'third' },
    ]);
    expect(result.text).toBe('first\nthird');
  });

  it('returns empty text for a PDF with no text layer', async () => {
    const pdf = new FakePdf([[], []]);

    const result = await extractTextFromPdf(BYTES, { loader: loaderFor(pdf) });

    expect(result.text).toBe('');
    expect(result.pages).toEqual([]);
    expect(result.pagesRead).toBe(2);
  });

  it('wraps an unreadable document in a DocumentParseError', async () => {
    const failure = extractTextFromPdf(BYTES, { loader: brokenLoader });

    await expect(failure).rejects.toBeInstanceOf(DocumentParseError);
    await expect(failure).rejects.toThrow('Unable to open PDF document');
  });

  it('closes the document when a page cannot be read', async () => {
    const pdf = new FakePdf([pageFromLines(['fine']), pageFromLines(['broken'])], 2);

    await expect(extractTextFromPdf(BYTES, { loader: loaderFor(pdf) })).rejects.toThrow(
      'Unable to read PDF page 2'
    );
    expect(pdf.closed).toBe(true);
  });
});

describe('closing failures', () => {
  it('keeps the extracted text when the document fails to close', async () => {
    const pdf = new UnclosablePdf([pageFromLines(['Acme Store', 'Total ₪12.50'])]);

    const result = await extractTextFromPdf(BYTES, { loader: loaderFor(pdf) });

    expect(pdf.closed).toBe(true);
    expect(result.text).toBe('Acme Store\nTotal ₪12.50');
  });

  it('still returns guesses from the pipeline', async () => {
    const analysis = await analyzeDocument(
      { bytes: BYTES, filename: 'receipt.pdf', kind: 'pdf' },
      { pdfLoader: loaderFor(new UnclosablePdf([pageFromLines(['Acme Store', '₪12.50'])])) }
    );

    expect(analysis.textAvailable).toBe(true);
    expect(analysis.guess).toEqual({
      guessDate: null,
      guessAmount: 12.5,
      guessVendor: 'Acme Store',
    });
  });

  it('reports the page failure rather than the close failure', async () => {
    const pdf = new UnclosablePdf([pageFromLines(['fine']), pageFromLines(['broken'])], 2);

    await expect(extractTextFromPdf(BYTES, { loader: loaderFor(pdf) })).rejects.toThrow(
      'Unable to read PDF page 2'
    );
  });
});

describe('pdfjsLoader', () => {
  let consoleLog: jest.SpyInstance;

  beforeEach(() => {
    consoleLog = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleLog.mockRestore();
  });

  it('reads the text layer of a real PDF', async () => {
    const bytes = minimalPdf(['Acme Store', '15/03/2024']);

    const result = await extractTextFromPdf(bytes, { loader: pdfjsLoader });

    expect(result.totalPages).toBe(1);
    expect(result.pagesRead).toBe(1);
    expect(result.text).toBe('Acme Store\n15/03/2024');
  });

  it('feeds the pipeline end to end', async () => {
    const analysis = await analyzeDocument({
      bytes: minimalPdf(['Acme Store', '15/03/2024']),
      filename: 'receipt.pdf',
      kind: 'pdf',
    });

    expect(analysis.guess).toEqual({
      guessDate: '2024-03-15',
      guessAmount: null,
      guessVendor: 'Acme Store',
    });
  });

  it('rejects bytes that are not a PDF', async () => {
    const failure = extractTextFromPdf(new Uint8Array([1, 2, 3]), { loader: pdfjsLoader });

    await expect(failure).rejects.toBeInstanceOf(DocumentParseError);
    await expect(failure).rejects.toThrow('Unable to open PDF document');
  });

  it('writes nothing to stdout', async () => {
    await extractTextFromPdf(minimalPdf(['Acme Store']), { loader: pdfjsLoader });
    await extractTextFromPdf(new Uint8Array([1, 2, 3]), { loader: pdfjsLoader }).catch(
      (error: unknown) => error
    );

    expect(consoleLog).not.toHaveBeenCalled();
  });
});
