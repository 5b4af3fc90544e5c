#!/usr/bin/env tsx
/**
 * Generate dashboard-data.json from Athena
 *
 * Runs every dashboard query (or the --query subset), waits for each to
 * finish and writes the coerced rows to one JSON file for the static
 * dashboard. Run with --help for options.
 */

import { resolve } from 'path';
import { config } from 'dotenv';
config({ path: resolve(process.cwd(), '.env.local') });
config();

import { createAthenaQueryService } from '../lib/athena/client';
import { runCli } from '../lib/dashboard/cli';

async function main() {
  process.exitCode = await runCli(process.argv.slice(2), process.env, createAthenaQueryService);
}

main().catch((error) => {
  console.error('❌ Dashboard data generation failed:', error);
  process.exit(1);
});
