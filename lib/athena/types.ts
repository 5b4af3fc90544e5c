export type QueryState = 'QUEUED' | 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'CANCELLED';

const QUERY_STATES: readonly QueryState[] = ['QUEUED', 'RUNNING', 'SUCCEEDED', 'FAILED', 'CANCELLED'];

const TERMINAL_STATES: ReadonlySet<QueryState> = new Set<QueryState>(['SUCCEEDED', 'FAILED', 'CANCELLED']);

export function isQueryState(value: string): value is QueryState {
  return QUERY_STATES.some(state => state === value);
}

export function isTerminalState(state: QueryState): boolean {
  return TERMINAL_STATES.has(state);
}

export interface QueryStatus {
  state: QueryState;
  reason?: string;
}

/**
 * Raw tabular result with the header row already removed.
 * Cells are the service's string payloads; null where the service sent none.
 */
export interface RawResultSet {
  columns: string[];
  rows: (string | null)[][];
}

/**
 * Submit / poll / fetch contract of a managed SQL execution service.
 */
export interface QueryService {
  startQuery(sql: string): Promise<string>;
  getQueryStatus(executionId: string): Promise<QueryStatus>;
  getQueryResults(executionId: string): Promise<RawResultSet>;
}
