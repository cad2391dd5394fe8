/**
 * 로거 컨텍스트 유틸리티
 *
 * 컨텍스트 인식 자식 로거 생성 헬퍼
 */

import type { Logger } from "@/config/logger";

/**
 * Request 전용 로거 생성
 * @param requestId - Request ID (UUID)
 * @param method - HTTP method
 * @param path - 요청 경로
 */
export function createRequestLogger(
  logger: Logger,
  requestId: string,
  method: string,
  path: string,
): Logger {
  return logger.child({
    request_id: requestId,
    method,
    path,
  });
}

/**
 * 컴포넌트 전용 로거 생성
 * @param component - SERVICE_NAMES 값
 */
export function createComponentLogger(logger: Logger, component: string): Logger {
  return logger.child({ component });
}

/**
 * 중요 정보 로깅
 */
export function logImportant(
  logger: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  logger.info({ ...data, important: true }, message);
}
