import * as path from 'path';
import { loadRuleTable, parseRuleTable } from './rule-table.loader';
import { MissingRuleTableError } from '../models/errors';
import { createTempDir, removeTempDir, writeFixture } from '../../../testing/temp-dir';

describe('rule-table.loader', () => {

  describe('parseRuleTable', () => {
    it('should keep document order at every level of a transaction map', () => {
      const table = parseRuleTable({
        'Transaction Map': {
          Payments: {
            Groceries: { Supermarket: ['woolworths', 'checkers'], Butcher: ['meat'] },
            Fuel: { Garage: ['engen'] }
          },
          EFT: { Housing: { Rent: ['rent'] } }
        }
      }, 'mappings.json');

      if (table.kind !== 'payments') {
        fail('expected a transaction map');
        return;
      }
      expect(Array.from(table.typedRules.keys())).toEqual(['Payments', 'EFT']);
      expect(table.genericPaymentRules).toEqual([
        {
          category: 'Groceries',
          labels: [
            { label: 'Supermarket', matches: ['woolworths', 'checkers'] },
            { label: 'Butcher', matches: ['meat'] }
          ]
        },
        { category: 'Fuel', labels: [{ label: 'Garage', matches: ['engen'] }] }
      ]);
    });

    it('should treat a missing Payments bucket as empty', () => {
      const table = parseRuleTable({ 'Transaction Map': { EFT: {} } }, 'mappings.json');
      expect(table.kind === 'payments' && table.genericPaymentRules).toEqual([]);
    });

    it('should flatten a category mapping into ordered rules', () => {
      const table = parseRuleTable({
        category_mapping: { '': { netflix: 'Subscriptions' }, Cash: { 'car wash': 'Car' } }
      }, 'mappings.json');

      expect(table).toEqual({
        kind: 'flat',
        rules: [
          { transactionType: '', match: 'netflix', category: 'Subscriptions' },
          { transactionType: 'Cash', match: 'car wash', category: 'Car' }
        ]
      });
    });

    it('should reject a document carrying both shapes', () => {
      expect(() => parseRuleTable({ 'Transaction Map': {}, category_mapping: {} }, 'mappings.json'))
        .toThrowError(MissingRuleTableError);
    });

    it('should reject substrings that are not strings', () => {
      expect(() => parseRuleTable({ 'Transaction Map': { EFT: { Housing: { Rent: [1, 2] } } } }, 'mappings.json'))
        .toThrowError(MissingRuleTableError);
    });

    it('should reject a document with neither shape', () => {
      expect(() => parseRuleTable([], 'mappings.json')).toThrowError(MissingRuleTableError);
    });
  });

  describe('loadRuleTable', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await createTempDir();
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    it('should load a rule table from disk', async () => {
      const filePath = await writeFixture(dir, 'mappings.json', JSON.stringify({
        'Transaction Map': { Transfer: { Transfer: { Transfer: [] } } }
      }));

      const table = await loadRuleTable(filePath);
      expect(table.kind).toBe('payments');
    });

    it('should fail when the file does not exist', async () => {
      await expectAsync(loadRuleTable(path.join(dir, 'missing.json')))
        .toBeRejectedWithError(MissingRuleTableError);
    });

    it('should fail when the file is not JSON', async () => {
      const filePath = await writeFixture(dir, 'mappings.json', '{ "Transaction Map": ');
      await expectAsync(loadRuleTable(filePath)).toBeRejectedWithError(MissingRuleTableError);
    });
  });
});
