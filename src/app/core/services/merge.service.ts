// core/services/merge.service.ts
import { CanonicalTransaction, ClassifiedTransaction } from '../models/transaction.model';

/**
 * Identity of a record for exact deduplication: every field, extras included,
 * plus Category/Payment once they exist.
 */
export function generateFingerprint(txn: CanonicalTransaction | ClassifiedTransaction): string {
  const extras = Object.keys(txn.extra)
    .sort()
    .map(key => [key, txn.extra[key]]);

  const parts: unknown[] = [
    txn.date,
    txn.description,
    txn.amount,
    txn.transactionType,
    txn.accountNumber,
    txn.accountName,
    extras
  ];
  if ('category' in txn) {
    parts.push(txn.category, txn.payment ?? null);
  }

  return JSON.stringify(parts);
}

/** Drops exact duplicates; the first occurrence keeps its position. */
export function dedupeTransactions<T extends CanonicalTransaction>(transactions: T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const txn of transactions) {
    const fingerprint = generateFingerprint(txn);
    if (seen.has(fingerprint)) continue;
    seen.add(fingerprint);
    unique.push(txn);
  }

  return unique;
}

/** Unions per-source collections in the order given, then deduplicates. */
export function mergeSources<T extends CanonicalTransaction>(collections: T[][]): T[] {
  return dedupeTransactions(collections.flat());
}
