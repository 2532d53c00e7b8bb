// core/models/category.model.ts

export const UNKNOWN = 'Unknown';
export const UNCATEGORISED = 'Uncategorised';
export const TRANSFER = 'Transfer';
export const EFT = 'EFT';

/** Bucket in the transaction map that generic purchases are matched against. */
export const PAYMENTS_BUCKET = 'Payments';

// Card and generic purchase types carry no useful type information of their own,
// so they are matched against the Payments bucket instead of a per-type rule set.
export const GENERIC_PAYMENT_TYPES: readonly string[] = ['Apple Pay', 'POS Purchase', 'FNB Generic'];

export interface PaymentLabelRule {
  label: string;
  matches: string[];
}

export interface CategoryRuleSet {
  category: string;
  labels: PaymentLabelRule[];
}

/**
 * "Transaction Map" rule table: type -> category -> payment label -> substrings.
 * Every level keeps the order the entries had in the document.
 */
export interface PaymentRuleTable {
  kind: 'payments';
  genericPaymentRules: CategoryRuleSet[];
  typedRules: Map<string, CategoryRuleSet[]>;
}

export interface FlatRule {
  transactionType: string;  // empty matches any type
  match: string;
  category: string;
}

/** "category_mapping" rule table: type -> substring -> category. */
export interface FlatRuleTable {
  kind: 'flat';
  rules: FlatRule[];
}

export type RuleTable = PaymentRuleTable | FlatRuleTable;

export interface CategoryAssignment {
  category: string;
  payment?: string;
}
