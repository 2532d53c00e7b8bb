import {
  DISCOVERY_ACCOUNT_NAME,
  DISCOVERY_ACCOUNT_NUMBER,
  DiscoveryCsvParser
} from './discovery-csv.parser';
import { MalformedSourceError } from '../models/errors';
import { UNPARSEABLE_DATE } from '../models/transaction.model';

describe('DiscoveryCsvParser', () => {
  let parser: DiscoveryCsvParser;
  const HEADER = 'Value Date,Value Time,Type,Description,Beneficiary or CardHolder,Amount';

  beforeEach(() => {
    parser = new DiscoveryCsvParser();
  });

  it('should rename columns and tag the card account', () => {
    const content = [HEADER, '2024-03-15 00:00:00,10:22,Apple Pay,Uber Eats ,J Doe,-120.50'].join('\n');
    const result = parser.parse(content, 'discovery.csv');

    expect(result.transactions).toEqual([{
      date: '2024/03/15',
      description: 'Uber Eats',
      amount: -120.5,
      transactionType: 'Apple Pay',
      accountNumber: DISCOVERY_ACCOUNT_NUMBER,
      accountName: DISCOVERY_ACCOUNT_NAME,
      extra: { 'Time': '10:22', 'Beneficiary/CardHolder': 'J Doe' }
    }]);
  });

  it('should normalize date-only and date-time values to yyyy/MM/dd', () => {
    const content = [
      HEADER,
      '2024-03-16,08:00,Transfer,Own account,J Doe,500',
      '2024/03/17 09:15,09:15,POS Purchase,Spar,J Doe,-45',
      '2024-03-18T14:05:00,14:05,POS Purchase,Engen,J Doe,-300'
    ].join('\n');

    const dates = parser.parse(content, 'discovery.csv').transactions.map(t => t.date);
    expect(dates).toEqual(['2024/03/16', '2024/03/17', '2024/03/18']);
  });

  it('should keep the written calendar date of an offset date-time', () => {
    const content = [
      HEADER,
      '2024-03-18T01:00:00+02:00,01:00,POS Purchase,Engen,J Doe,-300',
      '2024-03-19T23:30:00-05:00,23:30,POS Purchase,Spar,J Doe,-45',
      '2024-03-20T00:15:00Z,00:15,POS Purchase,Woolworths,J Doe,-80'
    ].join('\n');

    const dates = parser.parse(content, 'discovery.csv').transactions.map(t => t.date);
    expect(dates).toEqual(['2024/03/18', '2024/03/19', '2024/03/20']);
  });

  it('should mark an invalid date instead of failing', () => {
    const content = [HEADER, 'not a date,08:00,Transfer,Own account,J Doe,500'].join('\n');
    const result = parser.parse(content, 'discovery.csv');

    expect(result.transactions[0].date).toBe(UNPARSEABLE_DATE);
    expect(result.errors[0].row).toBe(2);
  });

  it('should reject an export without the expected columns', () => {
    expect(() => parser.parse('Date,Narration\n2024-03-16,Coffee', 'discovery.csv'))
      .toThrowError(MalformedSourceError);
  });
});
