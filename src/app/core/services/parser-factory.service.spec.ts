import { ParserFactoryService, SOURCE_ORDER } from './parser-factory.service';
import { FnbCsvParser } from '../parsers/fnb-csv.parser';
import { DiscoveryCsvParser } from '../parsers/discovery-csv.parser';
import { StandardBankCsvParser } from '../parsers/standard-bank-csv.parser';
import { CashLedgerParser } from '../parsers/cash-ledger.parser';

describe('ParserFactoryService', () => {
  let service: ParserFactoryService;

  beforeEach(() => {
    service = new ParserFactoryService();
  });

  it('should select the parser from the source folder', () => {
    expect(service.getParserForSource('FNB')).toBeInstanceOf(FnbCsvParser);
    expect(service.getParserForSource('Discovery')).toBeInstanceOf(DiscoveryCsvParser);
    expect(service.getParserForSource('Standard Bank')).toBeInstanceOf(StandardBankCsvParser);
    expect(service.getParserForSource('Cash')).toBeInstanceOf(CashLedgerParser);
  });

  it('should list sources in merge order', () => {
    expect(SOURCE_ORDER).toEqual(['FNB', 'Discovery', 'Standard Bank', 'Cash']);
    expect(SOURCE_ORDER.map(source => service.getParserForSource(source).bankId))
      .toEqual(['FNB', 'DISCOVERY', 'STANDARD_BANK', 'CASH']);
  });
});
