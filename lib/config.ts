/**
 * Generator Configuration
 *
 * Reads Athena connection settings and output options from the environment.
 * Scripts load `.env.local` through dotenv before calling loadConfig().
 *
 * Usage:
 *   const config = loadConfig(process.env);
 */

import { ConfigError } from './errors';

export interface GeneratorConfig {
  region: string;
  database: string;
  outputLocation: string; // s3:// staging prefix for Athena result files
  workgroup?: string;
  pollIntervalMs: number;
  outputPath: string;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_DATABASE = 'ecommerce_db';
export const DEFAULT_POLL_INTERVAL_MS = 2000;
export const DEFAULT_OUTPUT_PATH = 'dashboard-data.json';

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function loadConfig(env: Env): GeneratorConfig {
  const problems: string[] = [];

  const outputLocation = readString(env, 'ATHENA_OUTPUT_LOCATION');
  if (!outputLocation) {
    problems.push('ATHENA_OUTPUT_LOCATION is required');
  } else if (!outputLocation.startsWith('s3://')) {
    problems.push(`ATHENA_OUTPUT_LOCATION must be an s3:// URI, got "${outputLocation}"`);
  }

  let pollIntervalMs = DEFAULT_POLL_INTERVAL_MS;
  const rawInterval = readString(env, 'ATHENA_POLL_INTERVAL_MS');
  if (rawInterval !== undefined) {
    const parsed = Number(rawInterval);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      problems.push(`ATHENA_POLL_INTERVAL_MS must be a positive integer, got "${rawInterval}"`);
    } else {
      pollIntervalMs = parsed;
    }
  }

  if (problems.length > 0 || !outputLocation) {
    throw new ConfigError(problems);
  }

  return {
    region: readString(env, 'AWS_REGION') ?? DEFAULT_REGION,
    database: readString(env, 'ATHENA_DATABASE') ?? DEFAULT_DATABASE,
    outputLocation,
    workgroup: readString(env, 'ATHENA_WORKGROUP'),
    pollIntervalMs,
    outputPath: readString(env, 'DASHBOARD_OUTPUT_PATH') ?? DEFAULT_OUTPUT_PATH,
  };
}
