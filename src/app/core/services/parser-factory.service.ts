// core/services/parser-factory.service.ts
import { BankParser } from '../parsers/bank-parser.abstract';
import { FnbCsvParser } from '../parsers/fnb-csv.parser';
import { DiscoveryCsvParser } from '../parsers/discovery-csv.parser';
import { StandardBankCsvParser } from '../parsers/standard-bank-csv.parser';
import { CashLedgerParser } from '../parsers/cash-ledger.parser';

/** Input folder names; each folder holds exports of one dialect. */
export type SourceId = 'FNB' | 'Discovery' | 'Standard Bank' | 'Cash';

// Merge order of the sources
export const SOURCE_ORDER: readonly SourceId[] = ['FNB', 'Discovery', 'Standard Bank', 'Cash'];

export class ParserFactoryService {
  // Selected by folder, never by sniffing file contents
  private readonly parsers: Record<SourceId, BankParser> = {
    'FNB': new FnbCsvParser(),
    'Discovery': new DiscoveryCsvParser(),
    'Standard Bank': new StandardBankCsvParser(),
    'Cash': new CashLedgerParser()
  };

  getParserForSource(source: SourceId): BankParser {
    return this.parsers[source];
  }
}
