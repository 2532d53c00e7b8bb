// core/parsers/fnb-csv.parser.ts
import { BankParser, ParseResult } from './bank-parser.abstract';
import { MalformedSourceError } from '../models/errors';

export const FNB_DEFAULT_TYPE = 'FNB Generic';
export const FNB_FEE_TYPE = 'Fee';

// Lines before the header row; the last of them names the account.
const METADATA_LINES = 4;
const CONSUMED_COLUMNS = ['Date', 'Description', 'Amount'];

/**
 * FNB exports open with four metadata lines, the fourth being
 * `<label>,<account number>,<decorated account name>`, followed by a
 * regular CSV table whose header sits on line 5.
 */
export class FnbCsvParser extends BankParser {
  bankId = 'FNB';
  bankName = 'FNB';

  parse(content: string, filePath: string): ParseResult {
    const lines = this.splitLines(content);
    if (lines.length <= METADATA_LINES) {
      throw new MalformedSourceError(
        `expected ${METADATA_LINES} metadata lines and a header row, found ${lines.length} line(s)`,
        filePath
      );
    }

    const { accountNumber, accountName } = this.readAccountInfo(lines[METADATA_LINES - 1], filePath);

    // Metadata and table must agree: header on line 5, data from line 6
    const table = this.readTable(lines.slice(METADATA_LINES), METADATA_LINES + 1);
    this.requireColumns(table.headers, CONSUMED_COLUMNS, filePath);

    const result = this.emptyResult();
    table.rows.forEach((row, index) => {
      const description = this.cleanDescription(row['Description']);

      this.addRow(result, {
        rawDate: row['Date'],
        date: this.parseDate(row['Date']),
        description,
        amount: row['Amount'],
        transactionType: description.startsWith('#') ? FNB_FEE_TYPE : FNB_DEFAULT_TYPE,
        accountNumber,
        accountName,
        extra: this.collectExtras(row, CONSUMED_COLUMNS)
      }, filePath, table.firstDataLine + index);
    });

    return result;
  }

  private readAccountInfo(line: string, filePath: string): { accountNumber: string; accountName: string } {
    const fields = line.trim().split(',');
    if (fields.length < 3) {
      throw new MalformedSourceError(
        `account metadata on line ${METADATA_LINES} has ${fields.length} field(s), expected at least 3`,
        filePath,
        METADATA_LINES
      );
    }

    // The name arrives wrapped: two leading characters and one trailing
    const accountNumber = fields[1].trim();
    const accountName = fields[2].slice(2, -1);
    if (!accountNumber || !accountName) {
      throw new MalformedSourceError('account number or name is empty', filePath, METADATA_LINES);
    }

    return { accountNumber, accountName };
  }
}
