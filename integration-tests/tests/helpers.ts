/**
 * Test Helpers
 *
 * In-process stand-ins for the PDF engine and the expense store, plus
 * sample invoice text.
 */

import {
  sortExpenses,
  type ExpenseInput,
  type ExpenseRecord,
  type PdfLoader,
  type PdfPageSource,
  type PositionedText,
} from '@expense-tracker/shared';
import type { ExpenseRepository } from '../../services/expense-api/src/lib/repository';

export const HEBREW_INVOICE_LINES = [
  'לכבוד: חברת דוגמה בע״מ',
  'חשבונית מס 10234',
  'תאריך: 03.01.2024',
  'תאריך פירעון: 02.02.2024',
  'סה"כ לפני מע"מ: ₪1,271.19',
  'סה"כ לתשלום: ₪1,500.00',
];

export const HEBREW_INVOICE = HEBREW_INVOICE_LINES.join('\n');

/**
 * One text item per line, top to bottom.
 */
export function pageFromLines(lines: string[]): PositionedText[] {
  return lines.map((str, index) => ({ str, x: 40, y: 800 - index * 20 }));
}

/**
 * A PDF held in memory; records which pages were read and whether it was closed.
 */
export class FakePdf implements PdfPageSource {
  readonly requestedPages: number[] = [];
  closed = false;

  constructor(
    private readonly pageItems: PositionedText[][],
    private readonly failingPage?: number
  ) {}

  get numPages(): number {
    return this.pageItems.length;
  }

  async getPageItems(pageNumber: number): Promise<PositionedText[]> {
    this.requestedPages.push(pageNumber);
    if (pageNumber === this.failingPage) {
      throw new Error(`Corrupt content stream on page ${pageNumber}`);
    }
    return this.pageItems[pageNumber - 1] ?? [];
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * A PDF whose engine fails while tearing the document down.
 */
export class UnclosablePdf extends FakePdf {
  async close(): Promise<void> {
    this.closed = true;
    throw new Error('destroy failed');
  }
}

export function loaderFor(pdf: FakePdf): PdfLoader {
  return async () => pdf;
}

export function loaderForLines(...pages: string[][]): PdfLoader {
  return loaderFor(new FakePdf(pages.map(pageFromLines)));
}

export const brokenLoader: PdfLoader = async () => {
  throw new Error('Invalid PDF structure');
};

/**
 * A one-page PDF 1.4 file with each line drawn in Helvetica, 20pt apart.
 * Lines must be plain ASCII without parentheses or backslashes.
 */
export function minimalPdf(lines: string[]): Uint8Array {
  const content = lines
    .map((line, index) => `BT /F1 12 Tf 72 ${720 - index * 20} Td (${line}) Tj ET`)
    .join('\n');

  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>',
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
  ];

  let body = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((object, index) => {
    offsets.push(body.length);
    body += `${index + 1} 0 obj\n${object}\nendobj\n`;
  });

  const xrefOffset = body.length;
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    body += `${String(offset).padStart(10, '0')} 00000 n \n`;
  }
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return new Uint8Array(Buffer.from(body, 'latin1'));
}

export const CREATED_AT = '2024-05-01T10:00:00.000Z';

/**
 * Expense store kept in a Map. `available = false` makes ping fail.
 */
export class InMemoryExpenseRepository implements ExpenseRepository {
  private readonly records = new Map<number, ExpenseRecord>();
  private nextId = 1;
  available = true;

  async insert(input: ExpenseInput): Promise<ExpenseRecord> {
    const record: ExpenseRecord = { ...input, id: this.nextId++, created_at: CREATED_AT };
    this.records.set(record.id, record);
    return { ...record };
  }

  async update(id: number, input: ExpenseInput): Promise<ExpenseRecord | null> {
    const existing = this.records.get(id);
    if (!existing) return null;

    const updated: ExpenseRecord = { ...existing, ...input, filename: existing.filename };
    this.records.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<boolean> {
    return this.records.delete(id);
  }

  async getById(id: number): Promise<ExpenseRecord | null> {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async list(): Promise<ExpenseRecord[]> {
    return sortExpenses(Array.from(this.records.values()));
  }

  async ping(): Promise<void> {
    if (!this.available) {
      throw new Error('connection refused');
    }
  }
}

export function expense(overrides: Partial<ExpenseRecord> & { id: number }): ExpenseRecord {
  return {
    filename: `invoice-${overrides.id}.pdf`,
    doc_date: '2024-01-01',
    amount_ils: 0,
    vendor: '',
    category: 'לא משויך',
    notes: '',
    created_at: CREATED_AT,
    ...overrides,
  };
}
