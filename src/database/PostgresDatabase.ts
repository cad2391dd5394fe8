/**
 * PostgreSQL 연결 관리
 *
 * - pg Pool 생성 및 startup ping (fail fast)
 * - Repository용 query 위임
 * - Health check용 ping
 *
 * 동시성 제어는 pg Pool에 위임한다.
 */

import { Pool, type PoolConfig, type QueryResult, type QueryResultRow } from "pg";
import type { AppConfig } from "@/config/ConfigLoader";
import type { Logger } from "@/config/logger";
import type { ISqlExecutor } from "@/core/interfaces/ISqlExecutor";
import type { IHealthProbe } from "@/core/interfaces/IHealthProbe";

/**
 * AppConfig → pg PoolConfig
 */
export function toPoolConfig(config: AppConfig): PoolConfig {
  return {
    host: config.db_host,
    port: config.db_port,
    user: config.db_user,
    password: config.db_password,
    database: config.db_name,
    max: config.db_pool_max,
    ssl: config.db_sslmode === "require" ? { rejectUnauthorized: false } : false,
  };
}

export class PostgresDatabase implements ISqlExecutor, IHealthProbe {
  constructor(
    private readonly pool: Pool,
    private readonly logger: Logger,
  ) {
    // 유휴 클라이언트 에러는 프로세스를 죽이지 않도록 로깅만
    this.pool.on("error", (error) => {
      this.logger.error({ error: error.message }, "[Database] 유휴 클라이언트 오류");
    });
  }

  /**
   * Pool 생성 + 연결 확인
   * ping 실패 시 Pool을 닫고 throw
   */
  static async connect(config: AppConfig, logger: Logger): Promise<PostgresDatabase> {
    logger.info(
      {
        host: config.db_host,
        port: config.db_port,
        user: config.db_user,
        dbname: config.db_name,
      },
      "[Database] 연결 시도",
    );

    const database = new PostgresDatabase(new Pool(toPoolConfig(config)), logger);

    try {
      await database.ping();
    } catch (error) {
      logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        "[Database] 연결 실패",
      );
      await database.close();
      throw new Error(
        `error connecting to db: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    logger.info("[Database] 연결 완료");
    return database;
  }

  query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>> {
    return this.pool.query(text, values);
  }

  async ping(): Promise<void> {
    await this.pool.query("SELECT 1");
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.logger.info("[Database] 연결 종료");
  }
}
