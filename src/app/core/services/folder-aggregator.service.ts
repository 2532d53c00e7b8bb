// core/services/folder-aggregator.service.ts
import { readdir, readFile } from 'fs/promises';
import * as path from 'path';
import { BankParser } from '../parsers/bank-parser.abstract';
import { CanonicalTransaction } from '../models/transaction.model';
import { MalformedSourceError } from '../models/errors';
import { createSourceLogger } from '../utils/logger';
import { dedupeTransactions } from './merge.service';

export interface FolderAggregate {
  folderPath: string;
  transactions: CanonicalTransaction[];
  filesParsed: string[];
  failedFiles: MalformedSourceError[];
  rowErrors: MalformedSourceError[];
  skippedRows: number;
}

function isMissingDirectory(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FolderAggregatorService {

  /**
   * Parses every matching file of a folder, one after another, and unions the
   * results without exact duplicates. A malformed file is reported and skipped;
   * its siblings are still parsed.
   */
  async aggregateFolder(parser: BankParser, folderPath: string): Promise<FolderAggregate> {
    const log = createSourceLogger({ source: parser.bankId });
    const aggregate: FolderAggregate = {
      folderPath,
      transactions: [],
      filesParsed: [],
      failedFiles: [],
      rowErrors: [],
      skippedRows: 0
    };

    let fileNames: string[];
    try {
      const entries = await readdir(folderPath, { withFileTypes: true });
      fileNames = entries
        .filter(entry => entry.isFile() && parser.canParse(entry.name))
        .map(entry => entry.name)
        .sort();
    } catch (error) {
      if (!isMissingDirectory(error)) throw error;
      log.warn({ folderPath }, 'Source folder not found, treating it as empty');
      return aggregate;
    }

    const collected: CanonicalTransaction[] = [];
    for (const fileName of fileNames) {
      const filePath = path.join(folderPath, fileName);
      const fileLog = createSourceLogger({ source: parser.bankId, filePath });
      try {
        const result = parser.parse(await this.readSource(filePath), filePath);
        collected.push(...result.transactions);
        aggregate.filesParsed.push(filePath);
        aggregate.rowErrors.push(...result.errors);
        aggregate.skippedRows += result.skippedRows;

        for (const rowError of result.errors) {
          fileLog.debug({ row: rowError.row }, rowError.message);
        }
        fileLog.info(
          { transactions: result.transactions.length, skippedRows: result.skippedRows },
          'Parsed source file'
        );
      } catch (error) {
        if (!(error instanceof MalformedSourceError)) throw error;
        aggregate.failedFiles.push(error);
        fileLog.warn({ err: error }, 'Skipping malformed source file');
      }
    }

    aggregate.transactions = dedupeTransactions(collected);
    return aggregate;
  }

  private async readSource(filePath: string): Promise<string> {
    try {
      return await readFile(filePath, 'utf8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MalformedSourceError(`cannot open file (${reason})`, filePath);
    }
  }
}
