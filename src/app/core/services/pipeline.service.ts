// core/services/pipeline.service.ts
import * as path from 'path';
import { AppConfig } from '../config/app.config';
import { loadRuleTable } from '../config/rule-table.loader';
import { RuleTable } from '../models/category.model';
import { CanonicalTransaction, ClassifiedTransaction } from '../models/transaction.model';
import { MalformedSourceError } from '../models/errors';
import { logger } from '../utils/logger';
import { CategorizationService } from './categorization.service';
import { ExportService } from './export.service';
import { FolderAggregatorService } from './folder-aggregator.service';
import { mergeSources } from './merge.service';
import { ParserFactoryService, SOURCE_ORDER, SourceId } from './parser-factory.service';
import { CategoryStats, ReportService } from './report.service';

export interface SourceSummary {
  source: SourceId;
  folderPath: string;
  filesParsed: number;
  transactions: number;
  failedFiles: MalformedSourceError[];
  rowErrors: MalformedSourceError[];
}

export interface PipelineResult {
  variant: RuleTable['kind'];
  sources: SourceSummary[];
  transactions: ClassifiedTransaction[];
  categoryStats: CategoryStats[];
  unresolved: ClassifiedTransaction[];
  outputFiles: string[];
}

export class PipelineService {

  constructor(
    private readonly parserFactory = new ParserFactoryService(),
    private readonly aggregator = new FolderAggregatorService(),
    private readonly exporter = new ExportService(),
    private readonly reports = new ReportService()
  ) {}

  /**
   * One batch run: rule table, every source folder in merge order, merge,
   * classification, output files and the review report. A rule table that
   * cannot be loaded stops the run before any source is read.
   */
  async run(config: AppConfig): Promise<PipelineResult> {
    const ruleTable = await loadRuleTable(config.rulesFile);

    const sources: SourceSummary[] = [];
    const collections: CanonicalTransaction[][] = [];
    for (const source of SOURCE_ORDER) {
      const folderPath = path.join(config.inputDir, source);
      const aggregate = await this.aggregator.aggregateFolder(
        this.parserFactory.getParserForSource(source),
        folderPath
      );

      collections.push(aggregate.transactions);
      sources.push({
        source,
        folderPath,
        filesParsed: aggregate.filesParsed.length,
        transactions: aggregate.transactions.length,
        failedFiles: aggregate.failedFiles,
        rowErrors: aggregate.rowErrors
      });
    }

    const merged = mergeSources(collections);
    const categorizer = new CategorizationService(ruleTable);
    const transactions = categorizer.categorize(merged);

    const outputFiles = await this.exporter.writeOutputs(
      transactions,
      categorizer.outputColumns,
      config.outputDir,
      categorizer.hasPaymentColumn
    );

    const unresolved = this.reports.findUnresolved(transactions);
    logger.info(
      { merged: merged.length, unresolved: unresolved.length, variant: ruleTable.kind },
      'Categorized transactions'
    );

    return {
      variant: ruleTable.kind,
      sources,
      transactions,
      categoryStats: this.reports.buildCategoryStats(transactions),
      unresolved,
      outputFiles
    };
  }
}
