/**
 * SQL 실행 인터페이스
 *
 * pg Pool / PostgresDatabase가 구현
 * 테스트에서는 SQL과 파라미터를 기록하는 fake로 대체
 */

import type { QueryResult, QueryResultRow } from "pg";

export interface ISqlExecutor {
  query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>>;
}
