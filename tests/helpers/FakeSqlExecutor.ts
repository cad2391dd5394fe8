/**
 * SQL과 파라미터를 기록하는 ISqlExecutor fake
 */

import type { QueryResult, QueryResultRow } from "pg";
import { ISqlExecutor } from "@/core/interfaces/ISqlExecutor";

export interface RecordedQuery {
  text: string;
  values: unknown[];
}

type Responder = QueryResult<QueryResultRow> | Error;

export function queryResult(
  rows: QueryResultRow[],
  rowCount: number | null = rows.length,
  command = "SELECT",
): QueryResult<QueryResultRow> {
  return { command, rowCount, oid: 0, fields: [], rows };
}

export class FakeSqlExecutor implements ISqlExecutor {
  readonly queries: RecordedQuery[] = [];
  private readonly responses: Responder[] = [];

  /**
   * 다음 query 호출의 응답 등록 (FIFO)
   */
  respondWith(...responses: Responder[]): this {
    this.responses.push(...responses);
    return this;
  }

  async query(
    text: string,
    values: unknown[] = [],
  ): Promise<QueryResult<QueryResultRow>> {
    this.queries.push({ text, values });
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error(`unexpected query: ${text}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}
