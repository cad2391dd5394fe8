/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 콘솔(stdout) JSON 출력
 * - logDir 지정 시 파일 출력 추가 (일일 로테이션, YYYY-MM-DD/{serviceName}.log)
 * - 타임존 포함 ISO 8601 타임스탬프
 *
 * 전역 싱글톤 없이 startup에서 한 번 생성해 각 컴포넌트 생성자로 전달한다.
 */

import pino from "pino";
import { createStream } from "rotating-file-stream";
import path from "path";
import { getDateStringWithDash, getTimestampWithTimezone } from "@/utils/timestamp";

export type Logger = pino.Logger;

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface LoggerOptions {
  level: LogLevel;
  /** 파일 로그 디렉토리 (미지정 시 콘솔만) */
  logDir?: string;
  /** 파일명 및 base 필드용 서비스 이름 */
  serviceName?: string;
  env?: string;
}

/**
 * 로그 파일명 생성기
 * 구조: YYYY-MM-DD/{prefix}.log (로컬 타임존 날짜)
 */
export function rotatingFileName(prefix: string) {
  return (time: number | Date): string => {
    // 최초 파일은 time 없이 호출됨
    const dateDir = getDateStringWithDash(
      time instanceof Date ? time : new Date(),
    );
    return path.join(dateDir, `${prefix}.log`);
  };
}

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: logDir/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(logDir: string, prefix: string) {
  return createStream(rotatingFileName(prefix), {
    interval: "1d", // 일일 로테이션
    intervalBoundary: true, // 자정 기준
    immutable: true, // 과거 파일 수정 방지
    path: logDir,
    maxFiles: 90, // 90일 보관
    maxSize: "100M",
  });
}

/**
 * 로거 생성
 */
export function createLogger(options: LoggerOptions): Logger {
  const serviceName = options.serviceName ?? "server";
  const env = options.env ?? process.env.NODE_ENV ?? "development";

  const baseConfig: pino.LoggerOptions = {
    level: options.level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
    base: {
      service: serviceName,
      env,
    },
  };

  if (!options.logDir) {
    return pino(baseConfig);
  }

  // 레벨 필터는 logger가 담당, 스트림은 전부 통과
  const streams: pino.StreamEntry[] = [
    { level: "trace", stream: process.stdout },
    { level: "trace", stream: createRotatingStream(options.logDir, serviceName) },
  ];

  return pino(baseConfig, pino.multistream(streams));
}
