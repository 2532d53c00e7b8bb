// core/models/transaction.model.ts

/** Rendered in place of a date that could not be parsed. */
export const UNPARSEABLE_DATE = 'Invalid Date';

export interface CanonicalTransaction {
  date: string;             // yyyy/MM/dd or UNPARSEABLE_DATE
  description: string;      // trimmed, case and inner spacing preserved
  amount: number;           // sign as exported by the bank
  transactionType: string;
  accountNumber: string;
  accountName: string;

  // Columns a dialect carries beyond the canonical ones (time, codes, balance).
  // They count for deduplication but are never exported.
  extra: Record<string, string>;
}

export interface ClassifiedTransaction extends CanonicalTransaction {
  category: string;
  payment?: string;
}

export type OutputColumn =
  | 'Date'
  | 'Account Name'
  | 'Account Number'
  | 'Transaction Type'
  | 'Description'
  | 'Amount'
  | 'Category'
  | 'Payment';

export const TRANSACTION_COLUMNS: OutputColumn[] = [
  'Date',
  'Account Name',
  'Account Number',
  'Transaction Type',
  'Description',
  'Amount',
  'Category'
];

export const TRANSACTION_COLUMNS_WITH_PAYMENT: OutputColumn[] = [...TRANSACTION_COLUMNS, 'Payment'];

export const BUDGET_COLUMNS: OutputColumn[] = [
  'Date',
  'Description',
  'Amount',
  'Category',
  'Account Name'
];

export type OutputRow = Partial<Record<OutputColumn, string | number>>;

export function projectTransaction(txn: ClassifiedTransaction, columns: OutputColumn[]): OutputRow {
  const row: OutputRow = {};
  for (const column of columns) {
    switch (column) {
      case 'Date': row[column] = txn.date; break;
      case 'Account Name': row[column] = txn.accountName; break;
      case 'Account Number': row[column] = txn.accountNumber; break;
      case 'Transaction Type': row[column] = txn.transactionType; break;
      case 'Description': row[column] = txn.description; break;
      case 'Amount': row[column] = txn.amount; break;
      case 'Category': row[column] = txn.category; break;
      case 'Payment': row[column] = txn.payment ?? ''; break;
    }
  }
  return row;
}
