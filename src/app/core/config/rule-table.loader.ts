// core/config/rule-table.loader.ts
import { readFile } from 'fs/promises';
import { z } from 'zod';
import {
  CategoryRuleSet,
  FlatRule,
  PAYMENTS_BUCKET,
  RuleTable
} from '../models/category.model';
import { MissingRuleTableError } from '../models/errors';
import { logger } from '../utils/logger';

const TransactionMapSchema = z.record(z.record(z.record(z.array(z.string()))));
const CategoryMappingSchema = z.record(z.record(z.string()));

const RuleTableDocumentSchema = z.union([
  z.object({ 'Transaction Map': TransactionMapSchema }).strict(),
  z.object({ category_mapping: CategoryMappingSchema }).strict()
]);

type TransactionMapDocument = z.infer<typeof TransactionMapSchema>;

function toCategoryRuleSets(categories: TransactionMapDocument[string]): CategoryRuleSet[] {
  return Object.entries(categories).map(([category, labels]) => ({
    category,
    labels: Object.entries(labels).map(([label, matches]) => ({ label, matches }))
  }));
}

/**
 * Validates a parsed rule-table document and converts it to its ordered form.
 * The document shape selects the variant: "Transaction Map" or "category_mapping".
 */
export function parseRuleTable(document: unknown, filePath: string): RuleTable {
  const result = RuleTableDocumentSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new MissingRuleTableError(
      `expected an object with exactly one of "Transaction Map" or "category_mapping"${where}`,
      filePath
    );
  }

  const doc = result.data;
  if ('Transaction Map' in doc) {
    const typedRules = new Map<string, CategoryRuleSet[]>();
    for (const [transactionType, categories] of Object.entries(doc['Transaction Map'])) {
      typedRules.set(transactionType, toCategoryRuleSets(categories));
    }
    return {
      kind: 'payments',
      genericPaymentRules: typedRules.get(PAYMENTS_BUCKET) ?? [],
      typedRules
    };
  }

  const rules: FlatRule[] = [];
  for (const [transactionType, matches] of Object.entries(doc.category_mapping)) {
    for (const [match, category] of Object.entries(matches)) {
      rules.push({ transactionType, match, category });
    }
  }
  return { kind: 'flat', rules };
}

export async function loadRuleTable(filePath: string): Promise<RuleTable> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MissingRuleTableError(`cannot read rule table (${reason})`, filePath);
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MissingRuleTableError(`rule table is not valid JSON (${reason})`, filePath);
  }

  const table = parseRuleTable(document, filePath);
  logger.info(
    { filePath, variant: table.kind, ruleCount: table.kind === 'flat' ? table.rules.length : table.typedRules.size },
    'Loaded rule table'
  );
  return table;
}
