/**
 * Error types for the dashboard data generator
 *
 * Per-query failures never surface as these: the dataset builder logs and
 * skips them. Only configuration and service-contract problems are thrown.
 */

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export class QueryServiceError extends Error {
  readonly executionId?: string;

  constructor(message: string, executionId?: string) {
    super(executionId ? `${message} (execution ${executionId})` : message);
    this.name = 'QueryServiceError';
    this.executionId = executionId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
