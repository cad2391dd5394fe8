/**
 * HTTP 서버 종료 유틸리티
 *
 * 1. 새 연결 수락 중단 (server.close)
 * 2. 진행 중인 요청 완료 대기 (최대 timeoutMs)
 * 3. 초과 시 남은 연결 강제 종료 (closeAllConnections)
 */

import type { Server } from "http";
import type { Logger } from "@/config/logger";

export type ShutdownResult = "graceful" | "forced";

/**
 * 서버 종료
 * @returns 대기 시간 내 종료되면 "graceful", 강제 종료되면 "forced"
 */
export function closeServer(
  server: Server,
  timeoutMs: number,
  logger?: Logger,
): Promise<ShutdownResult> {
  return new Promise((resolve, reject) => {
    let forced = false;

    const timer = setTimeout(() => {
      forced = true;
      logger?.warn({ timeout_ms: timeoutMs }, "[Shutdown] 대기 시간 초과, 연결 강제 종료");
      server.closeAllConnections();
    }, timeoutMs);

    server.close((error) => {
      clearTimeout(timer);
      if (error) {
        reject(error);
        return;
      }
      resolve(forced ? "forced" : "graceful");
    });

    // keep-alive 유휴 연결은 즉시 정리
    server.closeIdleConnections();
  });
}

/**
 * listen 완료 또는 listen 에러 대기
 */
export function listen(server: Server, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      server.off("listening", onListening);
      reject(error);
    };
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };

    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port);
  });
}

/**
 * 종료 시그널 대기 (SIGINT, SIGTERM)
 * 먼저 도착한 시그널 이름으로 resolve
 */
export function waitForShutdownSignal(
  signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"],
): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const handlers = new Map<NodeJS.Signals, () => void>();

    for (const signal of signals) {
      const handler = () => {
        for (const [registered, registeredHandler] of handlers) {
          process.off(registered, registeredHandler);
        }
        resolve(signal);
      };
      handlers.set(signal, handler);
      process.once(signal, handler);
    }
  });
}
