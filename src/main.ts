#!/usr/bin/env node
import 'dotenv/config';
import { loadAppConfig } from './app/core/config/app.config';
import { PipelineService } from './app/core/services/pipeline.service';
import { ReportService } from './app/core/services/report.service';
import { logger } from './app/core/utils/logger';

// Usage: budget-sorter [input-dir]
async function main(): Promise<void> {
  const config = loadAppConfig(process.env, process.argv[2]);
  logger.level = config.logLevel;
  const result = await new PipelineService().run(config);
  const reports = new ReportService();

  console.log(reports.formatCategoryStats(result.categoryStats));
  console.log('');
  console.log(reports.formatUnresolved(result.unresolved));
}

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Run failed');
  process.exitCode = 1;
});
