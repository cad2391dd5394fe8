/**
 * 에러 핸들러 미들웨어
 * Express 전역 에러 처리
 *
 * ProductErrorCode → HTTP 상태 코드 매핑 후 plain text 응답
 */

import { Request, Response, NextFunction, ErrorRequestHandler } from "express";
import type { Logger } from "@/config/logger";
import { ProductErrorCode, isProductError } from "@/core/errors/ProductError";
import "@/types/express";

/**
 * 에러 코드에 따른 HTTP 상태 코드 반환
 */
export function getStatusCodeFromErrorCode(errorCode?: ProductErrorCode): number {
  switch (errorCode) {
    case ProductErrorCode.INVALID_INPUT:
      return 400;
    case ProductErrorCode.PRODUCT_NOT_FOUND:
      return 404;
    case ProductErrorCode.STORAGE_ERROR:
      return 500;
    default:
      return 500;
  }
}

/**
 * body-parser 에러 (잘못된 JSON, 크기 초과 등)
 * status/statusCode가 4xx로 설정되어 전달됨
 */
function getClientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null) {
    return null;
  }
  const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  if (typeof status === "number" && status >= 400 && status < 500) {
    return status;
  }
  return null;
}

/**
 * plain text 응답
 */
function sendText(res: Response, status: number, body: string): void {
  res.status(status).type("text/plain").send(body);
}

/**
 * 전역 에러 핸들러 생성
 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const log = req.log ?? logger;

    if (isProductError(err)) {
      const status = getStatusCodeFromErrorCode(err.code);
      if (status >= 500) {
        log.error({ error: err.toLogObject() }, "요청 처리 실패");
        sendText(res, status, "Internal server error");
        return;
      }
      log.warn({ error: err.toLogObject() }, "요청 처리 실패");
      sendText(res, status, err.message);
      return;
    }

    const clientStatus = getClientErrorStatus(err);
    if (clientStatus !== null) {
      log.warn(
        { error: err instanceof Error ? err.message : String(err), status: clientStatus },
        "잘못된 요청 바디",
      );
      sendText(res, 400, "Invalid input");
      return;
    }

    log.error(
      {
        error:
          err instanceof Error
            ? { message: err.message, stack: err.stack, name: err.name }
            : String(err),
      },
      "처리되지 않은 오류",
    );
    sendText(res, 500, "Internal server error");
  };
}

/**
 * 404 핸들러
 */
export function notFoundHandler(logger: Logger) {
  return (req: Request, res: Response): void => {
    (req.log ?? logger).warn({ path: req.path }, "경로를 찾을 수 없음");
    sendText(res, 404, "Not found");
  };
}
