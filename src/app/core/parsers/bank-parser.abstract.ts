// core/parsers/bank-parser.abstract.ts
import * as Papa from 'papaparse';
import { format, isValid, parse, parseISO } from 'date-fns';
import { CanonicalTransaction, UNPARSEABLE_DATE } from '../models/transaction.model';
import { MalformedSourceError } from '../models/errors';

export interface ParseResult {
  transactions: CanonicalTransaction[];
  errors: MalformedSourceError[];  // row-level problems; the file itself was usable
  skippedRows: number;
}

export interface SourceTable {
  headers: string[];
  rows: Record<string, string | undefined>[];
  firstDataLine: number;  // 1-based line number of rows[0]
}

export interface SourceRow {
  rawDate: string | undefined;
  date: string;
  description: string | undefined;
  amount: string | undefined;
  transactionType: string;
  accountNumber: string;
  accountName: string;
  extra: Record<string, string>;
}

export const OUTPUT_DATE_FORMAT = 'yyyy/MM/dd';

// Tried in order; date-time forms are listed beside their date-only form.
const ACCEPTED_DATE_FORMATS = [
  'yyyy/MM/dd',
  'yyyy/MM/dd HH:mm:ss',
  'yyyy/MM/dd HH:mm',
  'yyyy-MM-dd',
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd HH:mm',
  'dd/MM/yyyy',
  'dd/MM/yyyy HH:mm:ss',
  'dd/MM/yyyy HH:mm',
  'd MMM yyyy',
  'd MMM yyyy HH:mm:ss',
  'd MMM yyyy HH:mm',
  'yyyyMMdd'
];

const REFERENCE_DATE = new Date(2000, 0, 1);

// Plain decimal notation; Number() would also take 0x, 0b and 0o literals
const DECIMAL_AMOUNT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}T/;

export abstract class BankParser {
  abstract bankId: string;
  abstract bankName: string;
  supportedFormats: string[] = ['.csv'];

  // Parse the full text of one export file
  abstract parse(content: string, filePath: string): ParseResult;

  canParse(fileName: string): boolean {
    return this.supportedFormats.some(ext => fileName.endsWith(ext));
  }

  protected emptyResult(): ParseResult {
    return { transactions: [], errors: [], skippedRows: 0 };
  }

  // Rows without a description or a numeric amount are skipped; an unparseable
  // date keeps the row but is reported.
  protected addRow(result: ParseResult, row: SourceRow, filePath: string, line: number): void {
    const description = this.cleanDescription(row.description);
    const amount = this.parseAmount(row.amount);

    if (!description) {
      result.errors.push(new MalformedSourceError('description is empty', filePath, line));
      result.skippedRows++;
      return;
    }
    if (amount === null) {
      result.errors.push(new MalformedSourceError(`amount "${row.amount ?? ''}" is not a number`, filePath, line));
      result.skippedRows++;
      return;
    }
    if (row.date === UNPARSEABLE_DATE) {
      result.errors.push(new MalformedSourceError(`unparseable date "${row.rawDate ?? ''}"`, filePath, line));
    }

    result.transactions.push({
      date: row.date,
      description,
      amount,
      transactionType: row.transactionType,
      accountNumber: row.accountNumber,
      accountName: row.accountName,
      extra: row.extra
    });
  }

  // Physical lines without a BOM or trailing blank lines
  protected splitLines(content: string): string[] {
    const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);
    while (lines.length > 0 && lines[lines.length - 1].trim() === '') {
      lines.pop();
    }
    return lines;
  }

  protected readTable(
    lines: string[],
    firstLine: number,
    renameHeader: (header: string) => string = header => header
  ): SourceTable {
    const result = Papa.parse<Record<string, string | undefined>>(lines.join('\n'), {
      header: true,
      delimiter: ',',
      skipEmptyLines: true,
      transformHeader: header => renameHeader(header.trim())
    });

    return {
      headers: result.meta.fields ?? [],
      rows: result.data,
      firstDataLine: firstLine + 1
    };
  }

  protected readPositionalRows(lines: string[]): string[][] {
    return Papa.parse<string[]>(lines.join('\n'), { delimiter: ',', skipEmptyLines: true }).data;
  }

  protected requireColumns(headers: string[], required: string[], filePath: string): void {
    const missing = required.filter(column => !headers.includes(column));
    if (missing.length > 0) {
      throw new MalformedSourceError(
        `missing column(s) ${missing.map(c => `"${c}"`).join(', ')} in ${this.bankName} export`,
        filePath
      );
    }
  }

  // Parse numeric value from string
  protected parseAmount(value: string | undefined): number | null {
    if (value === undefined) return null;

    const str = value
      .trim()
      .replace(/,/g, '')         // thousand separators
      .replace(/\s/g, '')
      .replace(/[R$€£]/g, '');   // currency symbols

    if (!DECIMAL_AMOUNT.test(str)) return null;
    const parsed = Number(str);
    return Number.isFinite(parsed) ? parsed : null;
  }

  // Any accepted date or date-time form, rendered as yyyy/MM/dd
  protected parseDate(value: string | undefined): string {
    if (!value) return UNPARSEABLE_DATE;
    const cleaned = value.trim();

    for (const pattern of ACCEPTED_DATE_FORMATS) {
      const rendered = this.render(parse(cleaned, pattern, REFERENCE_DATE));
      if (rendered) return rendered;
    }

    // ISO date-time with a 'T' separator; the calendar date is kept as written
    // even when an offset is given
    if (ISO_DATE_PREFIX.test(cleaned) && isValid(parseISO(cleaned))) {
      return this.render(parse(cleaned.slice(0, 10), 'yyyy-MM-dd', REFERENCE_DATE)) ?? UNPARSEABLE_DATE;
    }
    return UNPARSEABLE_DATE;
  }

  // Only the given pattern, every character accounted for
  protected parseDateExact(value: string | undefined, pattern: string, shape: RegExp): string {
    if (!value) return UNPARSEABLE_DATE;
    const cleaned = value.trim();
    if (!shape.test(cleaned)) return UNPARSEABLE_DATE;

    return this.render(parse(cleaned, pattern, REFERENCE_DATE)) ?? UNPARSEABLE_DATE;
  }

  // Trim only; inner spacing is kept for display
  protected cleanDescription(desc: string | undefined): string {
    return (desc ?? '').trim();
  }

  protected collectExtras(
    row: Record<string, string | undefined>,
    consumed: string[]
  ): Record<string, string> {
    const extra: Record<string, string> = {};
    for (const [key, value] of Object.entries(row)) {
      if (consumed.includes(key) || key === '__parsed_extra') continue;
      extra[key] = (value ?? '').trim();
    }
    return extra;
  }

  private render(date: Date): string | null {
    if (!isValid(date)) return null;
    const year = date.getFullYear();
    if (year < 1900 || year > 2100) return null;
    return format(date, OUTPUT_DATE_FORMAT);
  }
}
