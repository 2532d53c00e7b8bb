// core/parsers/standard-bank-csv.parser.ts
import { BankParser, ParseResult } from './bank-parser.abstract';
import { MalformedSourceError } from '../models/errors';

export const STANDARD_BANK_ACCOUNT_NUMBER = '20000000002';
export const STANDARD_BANK_ACCOUNT_NAME = 'Standard Bank';

// The export has no header row; columns are positional
export const STANDARD_BANK_COLUMNS = ['HIST', 'Date', '#', 'Amount', 'Transaction Type', 'Description', 'Code', '0'];

const PREFIX_LINES = 3;
const CONSUMED_COLUMNS = ['Date', 'Amount', 'Transaction Type', 'Description'];

/**
 * Standard Bank statement: three lines of preamble, positional rows,
 * and a closing trailer line that is not a transaction.
 */
export class StandardBankCsvParser extends BankParser {
  bankId = 'STANDARD_BANK';
  bankName = 'Standard Bank';

  parse(content: string, filePath: string): ParseResult {
    const lines = this.splitLines(content);
    if (lines.length < PREFIX_LINES + 1) {
      throw new MalformedSourceError(
        `expected ${PREFIX_LINES} preamble lines and a trailer line, found ${lines.length} line(s)`,
        filePath
      );
    }

    const body = lines.slice(PREFIX_LINES, lines.length - 1);
    const result = this.emptyResult();

    this.readPositionalRows(body).forEach((cells, index) => {
      const row: Record<string, string | undefined> = {};
      STANDARD_BANK_COLUMNS.forEach((column, position) => {
        row[column] = cells[position];
      });

      this.addRow(result, {
        rawDate: row['Date'],
        date: this.parseDateExact(row['Date'], 'yyyyMMdd', /^\d{8}$/),
        description: row['Description'],
        amount: row['Amount'],
        transactionType: (row['Transaction Type'] ?? '').trim(),
        accountNumber: STANDARD_BANK_ACCOUNT_NUMBER,
        accountName: STANDARD_BANK_ACCOUNT_NAME,
        extra: this.collectExtras(row, CONSUMED_COLUMNS)
      }, filePath, PREFIX_LINES + 1 + index);
    });

    return result;
  }
}
