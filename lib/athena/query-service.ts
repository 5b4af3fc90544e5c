/**
 * Athena Query Service
 *
 * Thin adapter over @aws-sdk/client-athena implementing the QueryService
 * contract. Results are read through GetQueryResults page by page; Athena
 * puts the column header in the first row of the first page only.
 */

import {
  AthenaClient,
  GetQueryExecutionCommand,
  GetQueryResultsCommand,
  StartQueryExecutionCommand,
} from '@aws-sdk/client-athena';
import { QueryServiceError } from '../errors';
import { isQueryState, type QueryService, type QueryStatus, type RawResultSet } from './types';

export interface AthenaQueryOptions {
  database: string;
  outputLocation: string;
  workgroup?: string;
  pageSize?: number; // GetQueryResults MaxResults, Athena caps it at 1000
}

export type AthenaSender = Pick<AthenaClient, 'send'>;

export const DEFAULT_PAGE_SIZE = 1000;

export class AthenaQueryService implements QueryService {
  constructor(
    private readonly client: AthenaSender,
    private readonly options: AthenaQueryOptions
  ) {}

  async startQuery(sql: string): Promise<string> {
    const response = await this.client.send(
      new StartQueryExecutionCommand({
        QueryString: sql,
        QueryExecutionContext: { Database: this.options.database },
        ResultConfiguration: { OutputLocation: this.options.outputLocation },
        WorkGroup: this.options.workgroup,
      })
    );

    if (!response.QueryExecutionId) {
      throw new QueryServiceError('StartQueryExecution returned no QueryExecutionId');
    }
    return response.QueryExecutionId;
  }

  async getQueryStatus(executionId: string): Promise<QueryStatus> {
    const response = await this.client.send(
      new GetQueryExecutionCommand({ QueryExecutionId: executionId })
    );

    const status = response.QueryExecution?.Status;
    const state = status?.State;
    if (!state || !isQueryState(state)) {
      throw new QueryServiceError(`Unrecognised query state: ${state ?? 'none'}`, executionId);
    }

    const reason = status?.StateChangeReason;
    return reason ? { state, reason } : { state };
  }

  async getQueryResults(executionId: string): Promise<RawResultSet> {
    const columns: string[] = [];
    const rows: (string | null)[][] = [];
    let nextToken: string | undefined;
    let firstPage = true;

    do {
      const response = await this.client.send(
        new GetQueryResultsCommand({
          QueryExecutionId: executionId,
          NextToken: nextToken,
          MaxResults: this.options.pageSize ?? DEFAULT_PAGE_SIZE,
        })
      );

      const resultSet = response.ResultSet;
      if (firstPage) {
        const columnInfo = resultSet?.ResultSetMetadata?.ColumnInfo;
        if (!columnInfo) {
          throw new QueryServiceError('GetQueryResults returned no column metadata', executionId);
        }
        for (const column of columnInfo) {
          columns.push(column.Label ?? column.Name ?? '');
        }
      }

      const pageRows = resultSet?.Rows ?? [];
      // Skip header row
      for (const row of firstPage ? pageRows.slice(1) : pageRows) {
        rows.push((row.Data ?? []).map((datum) => datum.VarCharValue ?? null));
      }

      nextToken = response.NextToken;
      firstPage = false;
    } while (nextToken);

    return { columns, rows };
  }
}
