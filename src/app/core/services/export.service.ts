// core/services/export.service.ts
import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import * as Papa from 'papaparse';
import {
  BUDGET_COLUMNS,
  ClassifiedTransaction,
  OutputColumn,
  projectTransaction
} from '../models/transaction.model';
import { logger } from '../utils/logger';

export const TRANSACTIONS_FILE = 'Transactions.csv';
export const BUDGET_FILE = 'Budget.csv';

export class ExportService {

  toCsv(transactions: ClassifiedTransaction[], columns: OutputColumn[]): string {
    const data = transactions.map(txn => {
      const row = projectTransaction(txn, columns);
      return columns.map(column => row[column] ?? '');
    });

    return Papa.unparse({ fields: columns, data }, { newline: '\n' }) + '\n';
  }

  /**
   * Writes the classified transactions and, when a budget projection is wanted,
   * the narrower budget file. Returns the paths written.
   */
  async writeOutputs(
    transactions: ClassifiedTransaction[],
    columns: OutputColumn[],
    outputDir: string,
    includeBudget: boolean
  ): Promise<string[]> {
    await mkdir(outputDir, { recursive: true });

    const written: string[] = [];
    const transactionsPath = path.join(outputDir, TRANSACTIONS_FILE);
    await writeFile(transactionsPath, this.toCsv(transactions, columns), 'utf8');
    written.push(transactionsPath);

    if (includeBudget) {
      const budgetPath = path.join(outputDir, BUDGET_FILE);
      await writeFile(budgetPath, this.toCsv(transactions, BUDGET_COLUMNS), 'utf8');
      written.push(budgetPath);
    }

    logger.info({ files: written, transactions: transactions.length }, 'Wrote output files');
    return written;
  }
}
