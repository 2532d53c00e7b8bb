// core/parsers/cash-ledger.parser.ts
import { BankParser, ParseResult } from './bank-parser.abstract';

export const CASH_ACCOUNT_NUMBER = 'Cash Account';
export const CASH_ACCOUNT_NAME = 'Cash Transactions';
export const CASH_TRANSACTION_TYPE = 'Cash';

// A ledger's own type column is overwritten, so it is consumed here too
const CONSUMED_COLUMNS = ['Date', 'Description', 'Amount', 'Transaction Type'];

/** Hand-kept cash ledger: a plain CSV with Date, Description and Amount. */
export class CashLedgerParser extends BankParser {
  bankId = 'CASH';
  bankName = 'Cash';

  parse(content: string, filePath: string): ParseResult {
    const table = this.readTable(this.splitLines(content), 1);
    this.requireColumns(table.headers, ['Date', 'Description', 'Amount'], filePath);

    const result = this.emptyResult();
    table.rows.forEach((row, index) => {
      this.addRow(result, {
        rawDate: row['Date'],
        date: this.parseDate(row['Date']),
        description: row['Description'],
        amount: row['Amount'],
        transactionType: CASH_TRANSACTION_TYPE,
        accountNumber: CASH_ACCOUNT_NUMBER,
        accountName: CASH_ACCOUNT_NAME,
        extra: this.collectExtras(row, CONSUMED_COLUMNS)
      }, filePath, table.firstDataLine + index);
    });

    return result;
  }
}
