// core/services/report.service.ts
import { UNKNOWN } from '../models/category.model';
import { ClassifiedTransaction, UNPARSEABLE_DATE } from '../models/transaction.model';

export interface CategoryStats {
  category: string;
  count: number;
  totalAmount: number;
}

// Newest first; records without a usable date go last
function compareDatesDescending(a: string, b: string): number {
  if (a === b) return 0;
  if (a === UNPARSEABLE_DATE) return 1;
  if (b === UNPARSEABLE_DATE) return -1;
  return a < b ? 1 : -1;
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

export class ReportService {

  /** Count and summed amount per category, most frequent first. */
  buildCategoryStats(transactions: ClassifiedTransaction[]): CategoryStats[] {
    const byCategory = new Map<string, CategoryStats>();

    for (const txn of transactions) {
      const stats = byCategory.get(txn.category) ?? { category: txn.category, count: 0, totalAmount: 0 };
      stats.count++;
      stats.totalAmount += txn.amount;
      byCategory.set(txn.category, stats);
    }

    return Array.from(byCategory.values())
      .map(stats => ({ ...stats, totalAmount: roundCents(stats.totalAmount) }))
      .sort((a, b) => b.count - a.count);
  }

  /** Records a rule-table gap left unresolved, newest first. */
  findUnresolved(transactions: ClassifiedTransaction[]): ClassifiedTransaction[] {
    return transactions
      .filter(txn => txn.category === UNKNOWN || txn.payment === UNKNOWN)
      .sort((a, b) => compareDatesDescending(a.date, b.date));
  }

  formatCategoryStats(stats: CategoryStats[]): string {
    const lines = [
      `${'Category'.padEnd(20)} ${'Count'.padEnd(10)} Total Amount`,
      '-'.repeat(45),
      ...stats.map(s => `${s.category.padEnd(20)} ${String(s.count).padEnd(10)} ${s.totalAmount.toFixed(2)}`)
    ];
    return lines.join('\n');
  }

  formatUnresolved(transactions: ClassifiedTransaction[]): string {
    if (transactions.length === 0) {
      return 'No unresolved transactions.';
    }

    const lines = [
      `${'Transaction Type'.padEnd(20)} Description`,
      ...transactions.map(txn => `${txn.transactionType.padEnd(20)} ${txn.description}`)
    ];
    return lines.join('\n');
  }
}
