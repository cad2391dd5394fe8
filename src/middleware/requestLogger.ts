/**
 * Request Logger 미들웨어
 *
 * 기능:
 * - Request ID 생성 및 추적 (x-request-id 헤더가 있으면 재사용)
 * - 요청별 자식 로거를 req.log에 부착
 * - 응답 시간 측정
 * - Health check 요청은 debug 레벨로만 기록
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { v4 as uuidv4 } from "uuid";
import type { Logger } from "@/config/logger";
import { createRequestLogger } from "@/utils/LoggerContext";
import "@/types/express";

/**
 * debug 레벨로만 기록할 경로
 */
const QUIET_PATHS = ["/health"];

/**
 * Request Logger 미들웨어 생성
 */
export function requestLogger(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const headerId = req.get("x-request-id");
    const requestId = headerId && headerId.trim() !== "" ? headerId : uuidv4();
    const startTime = Date.now();
    const quiet = QUIET_PATHS.includes(req.path);

    const log = createRequestLogger(logger, requestId, req.method, req.path);
    req.log = log;
    req.id = requestId;
    res.setHeader("x-request-id", requestId);

    log[quiet ? "debug" : "info"]({ query: req.query, ip: req.ip }, "요청 수신");

    res.on("finish", () => {
      const duration = Date.now() - startTime;
      const level =
        res.statusCode >= 500 ? "error" : res.statusCode >= 400 ? "warn" : quiet ? "debug" : "info";

      log[level](
        {
          status: res.statusCode,
          duration_ms: duration,
        },
        "요청 완료",
      );
    });

    next();
  };
}
