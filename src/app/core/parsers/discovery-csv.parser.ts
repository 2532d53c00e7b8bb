// core/parsers/discovery-csv.parser.ts
import { BankParser, ParseResult } from './bank-parser.abstract';

export const DISCOVERY_ACCOUNT_NUMBER = '10000000001';
export const DISCOVERY_ACCOUNT_NAME = 'Discovery Credit Card';

// Export column -> canonical column
const COLUMN_RENAMES: Record<string, string> = {
  'Value Date': 'Date',
  'Value Time': 'Time',
  'Type': 'Transaction Type',
  'Description': 'Description',
  'Beneficiary or CardHolder': 'Beneficiary/CardHolder',
  'Amount': 'Amount'
};

const CONSUMED_COLUMNS = ['Date', 'Transaction Type', 'Description', 'Amount'];

export class DiscoveryCsvParser extends BankParser {
  bankId = 'DISCOVERY';
  bankName = 'Discovery';

  parse(content: string, filePath: string): ParseResult {
    const lines = this.splitLines(content);
    const table = this.readTable(lines, 1, header => COLUMN_RENAMES[header] ?? header);
    this.requireColumns(table.headers, CONSUMED_COLUMNS, filePath);

    const result = this.emptyResult();
    table.rows.forEach((row, index) => {
      this.addRow(result, {
        rawDate: row['Date'],
        date: this.parseDate(row['Date']),
        description: row['Description'],
        amount: row['Amount'],
        transactionType: (row['Transaction Type'] ?? '').trim(),
        accountNumber: DISCOVERY_ACCOUNT_NUMBER,
        accountName: DISCOVERY_ACCOUNT_NAME,
        extra: this.collectExtras(row, CONSUMED_COLUMNS)
      }, filePath, table.firstDataLine + index);
    });

    return result;
  }
}
