import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { EXIT_ALL_FAILED, EXIT_OK, generateDashboardData } from '../lib/dashboard/generate';
import { readDashboardData } from '../lib/dashboard/writer';
import type { QueryDefinition } from '../lib/dashboard/queries';
import { FakeQueryService, captureLogger, noSleep } from './helpers/fake-query-service';

const kpis: QueryDefinition = { name: 'kpis', description: 'test', sql: 'SELECT kpis' };
const basket: QueryDefinition = { name: 'market_basket', description: 'test', sql: 'SELECT basket' };

describe('generateDashboardData', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'dashboard-generate-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the succeeded datasets and reports the failures', async () => {
    const service = new FakeQueryService({
      'SELECT kpis': {
        statuses: [{ state: 'SUCCEEDED' }],
        result: { columns: ['TOTAL_ORDERS', 'TOTAL_REVENUE'], rows: [['25900', '9747747.934']] },
      },
      'SELECT basket': { statuses: [{ state: 'FAILED', reason: 'Query exhausted resources' }] },
    });
    const { lines, logger } = captureLogger();
    const outputPath = join(dir, 'dashboard-data.json');

    const { exitCode, report } = await generateDashboardData(service, [kpis, basket], {
      outputPath,
      pollIntervalMs: 1,
      logger,
      sleep: noSleep,
    });

    expect(exitCode).toBe(EXIT_OK);
    expect(report.failed).toEqual(['market_basket']);
    expect(readDashboardData(outputPath)).toEqual({
      kpis: [{ total_orders: 25900, total_revenue: 9747747.934 }],
    });
    expect(lines).toContain(`info:✅ Dashboard data saved to ${outputPath}`);
    expect(lines).toContain('info:📊 Datasets generated: 1/2');
    expect(lines).toContain('warn:⚠️  Failed queries: market_basket');
  });

  it('does not write anything on a dry run', async () => {
    const service = new FakeQueryService({
      'SELECT kpis': { statuses: [{ state: 'SUCCEEDED' }], result: { columns: ['a'], rows: [['1']] } },
    });
    const { lines, logger } = captureLogger();
    const outputPath = join(dir, 'dry.json');

    const { exitCode } = await generateDashboardData(service, [kpis], {
      outputPath,
      pollIntervalMs: 1,
      dryRun: true,
      logger,
      sleep: noSleep,
    });

    expect(exitCode).toBe(EXIT_OK);
    expect(existsSync(outputPath)).toBe(false);
    expect(lines).toContain(`info:🧪 Dry run: ${outputPath} not written`);
  });

  it('exits with the all-failed code when nothing succeeds', async () => {
    const service = new FakeQueryService({
      'SELECT kpis': { statuses: [{ state: 'CANCELLED' }] },
    });
    const outputPath = join(dir, 'failed.json');

    const { exitCode } = await generateDashboardData(service, [kpis], {
      outputPath,
      pollIntervalMs: 1,
      failureMode: 'empty',
      logger: captureLogger().logger,
      sleep: noSleep,
    });

    expect(exitCode).toBe(EXIT_ALL_FAILED);
    expect(readDashboardData(outputPath)).toEqual({ kpis: [] });
  });
});
