// core/services/categorization.service.ts
import {
  CategoryAssignment,
  CategoryRuleSet,
  EFT,
  FlatRuleTable,
  GENERIC_PAYMENT_TYPES,
  PaymentRuleTable,
  RuleTable,
  TRANSFER,
  UNCATEGORISED,
  UNKNOWN
} from '../models/category.model';
import {
  CanonicalTransaction,
  ClassifiedTransaction,
  OutputColumn,
  TRANSACTION_COLUMNS,
  TRANSACTION_COLUMNS_WITH_PAYMENT
} from '../models/transaction.model';

// Case-insensitive substring test; an empty pattern matches everything
function containsPattern(description: string, pattern: string): boolean {
  return description.includes(pattern.trim().toLowerCase());
}

export class CategorizationService {

  constructor(private readonly ruleTable: RuleTable) {}

  get hasPaymentColumn(): boolean {
    return this.ruleTable.kind === 'payments';
  }

  get outputColumns(): OutputColumn[] {
    return this.hasPaymentColumn ? TRANSACTION_COLUMNS_WITH_PAYMENT : TRANSACTION_COLUMNS;
  }

  /** Returns new records with Category (and Payment, for a transaction map) filled in. */
  categorize(transactions: CanonicalTransaction[]): ClassifiedTransaction[] {
    return transactions.map(txn => ({ ...txn, ...this.detectCategory(txn) }));
  }

  detectCategory(txn: CanonicalTransaction): CategoryAssignment {
    return this.ruleTable.kind === 'payments'
      ? this.matchTransactionMap(this.ruleTable, txn)
      : this.matchCategoryMapping(this.ruleTable, txn);
  }

  // First matching rule in table order wins
  private matchTransactionMap(table: PaymentRuleTable, txn: CanonicalTransaction): CategoryAssignment {
    const type = txn.transactionType;
    const description = txn.description.trim().toLowerCase();

    // 1. Generic purchases are looked up in the Payments bucket only
    if (GENERIC_PAYMENT_TYPES.includes(type)) {
      return this.firstMatch(table.genericPaymentRules, description)
        ?? { category: UNKNOWN, payment: UNKNOWN };
    }

    // 2. Rules keyed on the transaction type itself
    const categories = table.typedRules.get(type);
    if (categories) {
      if (type === TRANSFER) {
        // Any configured entry under Transfer is enough; the description is not consulted
        const hasEntry = categories.some(set => set.labels.length > 0);
        if (hasEntry) return { category: TRANSFER, payment: TRANSFER };
      } else if (type === EFT) {
        const eft = this.matchEft(categories, description, txn.description);
        if (eft) return eft;
      } else {
        const hit = this.firstMatch(categories, description);
        if (hit) return hit;
      }
    }

    // 3. Nothing matched
    return { category: UNKNOWN, payment: UNKNOWN };
  }

  /**
   * EFT decides on the first substring it checks: a hit gives that category,
   * a miss gives Uncategorised at once, without trying later substrings,
   * labels or categories. Labels with no substrings are passed over.
   * NOTE: every other branch searches exhaustively. The early exit is kept
   * as-is until the intended EFT behaviour is confirmed (DESIGN.md, open questions).
   */
  private matchEft(
    categories: CategoryRuleSet[],
    description: string,
    originalDescription: string
  ): CategoryAssignment | null {
    for (const { category, labels } of categories) {
      for (const { matches } of labels) {
        if (matches.length === 0) continue;
        return containsPattern(description, matches[0])
          ? { category, payment: originalDescription }
          : { category: UNCATEGORISED, payment: originalDescription };
      }
    }
    return null;
  }

  private firstMatch(categories: CategoryRuleSet[], description: string): CategoryAssignment | null {
    for (const { category, labels } of categories) {
      for (const { label, matches } of labels) {
        if (matches.some(pattern => containsPattern(description, pattern))) {
          return { category, payment: label };
        }
      }
    }
    return null;
  }

  private matchCategoryMapping(table: FlatRuleTable, txn: CanonicalTransaction): CategoryAssignment {
    const description = txn.description.toLowerCase();

    for (const rule of table.rules) {
      const typeMatches = rule.transactionType === '' || rule.transactionType === txn.transactionType;
      if (typeMatches && containsPattern(description, rule.match)) {
        return { category: rule.category };
      }
    }

    return { category: UNKNOWN };
  }
}
