/**
 * Dataset Builder
 *
 * Runs each dashboard query against the QueryService one at a time:
 *   submit -> poll until terminal -> fetch -> coerce rows
 *
 * A failed, cancelled or erroring query is logged and left out of the
 * document (or written as [] with failureMode 'empty'). Nothing here throws
 * for a single query; the caller only sees BuildReport.failed.
 */

import { ConfigError, errorMessage } from '../errors';
import { consoleLogger, type Logger } from '../logger';
import { DEFAULT_POLL_INTERVAL_MS } from '../config';
import { isTerminalState, type QueryService } from '../athena/types';
import { toRows, type ResultRow } from './coerce';
import type { QueryDefinition } from './queries';

export type Dataset = ResultRow[];
export type DashboardDocument = Record<string, Dataset>;
export type FailureMode = 'omit' | 'empty';

export interface ExecuteOptions {
  pollIntervalMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface BuildOptions extends ExecuteOptions {
  failureMode?: FailureMode;
}

export interface BuildReport {
  document: DashboardDocument;
  succeeded: string[];
  failed: string[];
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Execute one query and return its coerced rows, or null if it did not succeed.
 */
export async function executeQuery(
  service: QueryService,
  definition: QueryDefinition,
  options: ExecuteOptions = {}
): Promise<Dataset | null> {
  const logger = options.logger ?? consoleLogger;
  const sleep = options.sleep ?? defaultSleep;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;

  logger.info(`[Query] Executing ${definition.name}...`);

  try {
    const executionId = await service.startQuery(definition.sql);
    logger.info(`[Query] Execution ID: ${executionId}`);

    let status = await service.getQueryStatus(executionId);
    while (!isTerminalState(status.state)) {
      logger.info(`[Query] Status: ${status.state}...`);
      await sleep(pollIntervalMs);
      status = await service.getQueryStatus(executionId);
    }

    if (status.state !== 'SUCCEEDED') {
      logger.error(`❌ [Query] ${definition.name} ${status.state}: ${status.reason ?? 'Unknown error'}`);
      return null;
    }

    logger.info('[Query] Succeeded, fetching results...');
    const rows = toRows(await service.getQueryResults(executionId));
    logger.info(`✅ [Query] Retrieved ${rows.length} rows`);
    return rows;
  } catch (error) {
    logger.error(`❌ [Query] Error executing ${definition.name}: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Run every definition sequentially and collect the datasets.
 */
export async function buildDashboardData(
  service: QueryService,
  definitions: readonly QueryDefinition[],
  options: BuildOptions = {}
): Promise<BuildReport> {
  const failureMode = options.failureMode ?? 'omit';
  const report: BuildReport = { document: {}, succeeded: [], failed: [] };

  for (const definition of definitions) {
    const rows = await executeQuery(service, definition, options);

    if (rows !== null) {
      report.document[definition.name] = rows;
      report.succeeded.push(definition.name);
    } else {
      if (failureMode === 'empty') {
        report.document[definition.name] = [];
      }
      report.failed.push(definition.name);
    }
  }

  return report;
}

/**
 * Narrow definitions to the requested names, keeping definition order.
 */
export function selectQueries(
  definitions: readonly QueryDefinition[],
  names?: readonly string[]
): QueryDefinition[] {
  if (!names || names.length === 0) return [...definitions];

  const known = new Set(definitions.map(d => d.name));
  const unknown = names.filter(name => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigError([
      `Unknown query name(s): ${unknown.join(', ')}. Valid names: ${[...known].join(', ')}`,
    ]);
  }

  const wanted = new Set(names);
  return definitions.filter(d => wanted.has(d.name));
}
