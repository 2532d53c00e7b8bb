import { CashLedgerParser } from './cash-ledger.parser';

describe('CashLedgerParser', () => {
  let parser: CashLedgerParser;

  beforeEach(() => {
    parser = new CashLedgerParser();
  });

  it('should tag every row as a cash transaction', () => {
    const result = parser.parse('Date,Description,Amount\n2024/03/10,Car wash,-60\n', 'cash.csv');

    expect(result.transactions).toEqual([{
      date: '2024/03/10',
      description: 'Car wash',
      amount: -60,
      transactionType: 'Cash',
      accountNumber: 'Cash Account',
      accountName: 'Cash Transactions',
      extra: {}
    }]);
  });

  it('should override a type column kept in the ledger', () => {
    const result = parser.parse('Date,Description,Amount,Transaction Type\n10/03/2024,Tip,-20,Other\n', 'cash.csv');

    expect(result.transactions[0].transactionType).toBe('Cash');
    expect(result.transactions[0].date).toBe('2024/03/10');
    expect(result.transactions[0].extra).toEqual({});
  });

  it('should skip rows whose amount is not a number', () => {
    const result = parser.parse('Date,Description,Amount\n2024/03/10,Car wash,abc\n2024/03/11,Coffee,-35\n', 'cash.csv');

    expect(result.transactions.map(t => t.description)).toEqual(['Coffee']);
    expect(result.skippedRows).toBe(1);
    expect(result.errors[0].message).toBe('cash.csv (row 2): amount "abc" is not a number');
  });

  it('should skip amounts written as hex, binary or octal literals', () => {
    const content = 'Date,Description,Amount\n2024/03/10,Tip,0x10\n2024/03/11,Parking,0b11\n2024/03/12,Coffee,-35\n2024/03/13,Bread,1.5e1\n';
    const result = parser.parse(content, 'cash.csv');

    expect(result.transactions.map(t => t.amount)).toEqual([-35, 15]);
    expect(result.skippedRows).toBe(2);
    expect(result.errors.map(e => e.message)).toEqual([
      'cash.csv (row 2): amount "0x10" is not a number',
      'cash.csv (row 3): amount "0b11" is not a number'
    ]);
  });

  it('should only accept files with the .csv extension', () => {
    expect(parser.canParse('march.csv')).toBe(true);
    expect(parser.canParse('notes.txt')).toBe(false);
  });
});
