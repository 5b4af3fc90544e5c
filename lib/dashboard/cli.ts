/**
 * Command-line entry for the dashboard data generator
 *
 * Usage:
 *   const exitCode = await runCli(process.argv.slice(2), process.env, createAthenaQueryService);
 *
 * Configuration and argument errors are logged and give exit code 1.
 * Write failures propagate to the calling script.
 */

import { loadConfig, type Env, type GeneratorConfig } from '../config';
import { ConfigError } from '../errors';
import { consoleLogger, type Logger } from '../logger';
import type { QueryService } from '../athena/types';
import { parseArgs, USAGE } from './cli-args';
import { selectQueries } from './dataset-builder';
import { generateDashboardData } from './generate';
import { DASHBOARD_QUERIES } from './queries';

export const EXIT_CONFIG_ERROR = 1;

export interface CliOptions {
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export async function runCli(
  argv: string[],
  env: Env,
  createService: (config: GeneratorConfig) => QueryService,
  options: CliOptions = {}
): Promise<number> {
  const logger = options.logger ?? consoleLogger;

  try {
    const args = parseArgs(argv);

    if (args.help) {
      logger.info(USAGE);
      return 0;
    }

    if (args.list) {
      for (const query of DASHBOARD_QUERIES) {
        logger.info(`${query.name.padEnd(28)} ${query.description}`);
      }
      return 0;
    }

    const settings = loadConfig(env);
    const definitions = selectQueries(DASHBOARD_QUERIES, args.queries);

    const { exitCode } = await generateDashboardData(createService(settings), definitions, {
      outputPath: args.output ?? settings.outputPath,
      pollIntervalMs: settings.pollIntervalMs,
      failureMode: args.failureMode,
      dryRun: args.dryRun,
      logger,
      sleep: options.sleep,
    });
    return exitCode;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(`❌ ${error.message}`);
      logger.error('Run with --help for usage.');
      return EXIT_CONFIG_ERROR;
    }
    throw error;
  }
}
