/**
 * Product Catalog API 서버 엔트리포인트
 *
 * 1. 설정 로드 (config.yaml + 환경변수)
 * 2. 로거 생성
 * 3. DB 연결 + ping
 * 4. Repository → Service → App 조립
 * 5. listen, SIGINT/SIGTERM 수신 시 graceful shutdown
 */

import "dotenv/config";
import http from "http";
import {
  AppConfig,
  ConfigLoader,
  ConfigError,
  describeConfig,
} from "@/config/ConfigLoader";
import { createLogger } from "@/config/logger";
import { APP_METADATA, SERVICE_NAMES } from "@/config/constants";
import { PostgresDatabase } from "@/database/PostgresDatabase";
import { PostgresProductRepository } from "@/repositories/PostgresProductRepository";
import { ProductService } from "@/services/ProductService";
import { createApp } from "@/app";
import {
  closeServer,
  listen,
  waitForShutdownSignal,
} from "@/utils/gracefulShutdown";
import { createComponentLogger, logImportant } from "@/utils/LoggerContext";

/**
 * 설정 로드 실패 시 즉시 종료
 * 로거 생성 전이므로 stderr로 출력
 */
function loadConfigOrExit(): AppConfig {
  try {
    return new ConfigLoader().load();
  } catch (error) {
    const message = error instanceof ConfigError ? error.message : String(error);
    process.stderr.write(`Failed to load configuration: ${message}\n`);
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const config = loadConfigOrExit();

  const logger = createLogger({
    level: config.log_level,
    logDir: config.log_dir,
    serviceName: SERVICE_NAMES.SERVER,
  });
  logger.info({ config: describeConfig(config) }, "설정 로드 완료");

  const database = await PostgresDatabase.connect(
    config,
    createComponentLogger(logger, SERVICE_NAMES.DATABASE),
  );

  const repository = new PostgresProductRepository(
    database,
    createComponentLogger(logger, SERVICE_NAMES.PRODUCT_REPOSITORY),
  );
  const productService = new ProductService(
    repository,
    createComponentLogger(logger, SERVICE_NAMES.PRODUCT_SERVICE),
  );

  const app = createApp({ productService, healthProbe: database, logger });
  const server = http.createServer(app);

  try {
    await listen(server, config.server_port);
  } catch (error) {
    logger.fatal(
      { error: error instanceof Error ? error.message : String(error) },
      "서버 시작 실패",
    );
    await database.close();
    process.exit(1);
  }

  logImportant(logger, `${APP_METADATA.NAME} 서버 시작`, {
    port: config.server_port,
    version: APP_METADATA.VERSION,
  });

  const signal = await waitForShutdownSignal();
  logger.warn({ signal }, "종료 시그널 수신, 서버 종료 중...");

  try {
    const result = await closeServer(server, config.shutdown_timeout_ms, logger);
    logger.info({ result }, "HTTP 서버 종료");
  } catch (error) {
    logger.error(
      { error: error instanceof Error ? error.message : String(error) },
      "HTTP 서버 종료 실패",
    );
  }

  await database.close();
  logImportant(logger, "서버 종료 완료");
}

main().catch((error: unknown) => {
  process.stderr.write(
    `Fatal error: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`,
  );
  process.exit(1);
});
