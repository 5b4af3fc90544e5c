/**
 * Dashboard data generation run
 *
 * Builds every selected dataset, writes dashboard-data.json and prints the
 * summary. Returns the process exit code for the calling script.
 */

import { consoleLogger, type Logger } from '../logger';
import type { QueryService } from '../athena/types';
import { buildDashboardData, type BuildReport, type FailureMode } from './dataset-builder';
import type { QueryDefinition } from './queries';
import { writeDashboardData } from './writer';

export interface GenerateOptions {
  outputPath: string;
  pollIntervalMs: number;
  failureMode?: FailureMode;
  dryRun?: boolean;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export const EXIT_OK = 0;
export const EXIT_ALL_FAILED = 2;

export async function generateDashboardData(
  service: QueryService,
  definitions: readonly QueryDefinition[],
  options: GenerateOptions
): Promise<{ exitCode: number; report: BuildReport }> {
  const logger = options.logger ?? consoleLogger;

  logger.info('='.repeat(60));
  logger.info('DASHBOARD DATA GENERATOR');
  logger.info('='.repeat(60));
  logger.info('');

  const report = await buildDashboardData(service, definitions, {
    failureMode: options.failureMode,
    pollIntervalMs: options.pollIntervalMs,
    logger,
    sleep: options.sleep,
  });

  logger.info('='.repeat(60));
  if (options.dryRun) {
    logger.info(`🧪 Dry run: ${options.outputPath} not written`);
  } else {
    writeDashboardData(options.outputPath, report.document);
    logger.info(`✅ Dashboard data saved to ${options.outputPath}`);
  }
  logger.info(`📊 Datasets generated: ${report.succeeded.length}/${definitions.length}`);
  if (report.failed.length > 0) {
    logger.warn(`⚠️  Failed queries: ${report.failed.join(', ')}`);
  }
  logger.info('='.repeat(60));

  if (definitions.length > 0 && report.succeeded.length === 0) {
    return { exitCode: EXIT_ALL_FAILED, report };
  }

  if (!options.dryRun) {
    logger.info('');
    logger.info('Next steps:');
    logger.info(`1. Copy ${options.outputPath} into the dashboard's data/ folder`);
    logger.info('2. Sync the dashboard to its bucket (aws s3 sync)');
    logger.info('3. Invalidate the CDN cache so the new data is served');
  }

  return { exitCode: EXIT_OK, report };
}
