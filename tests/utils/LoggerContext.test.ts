import { describe, it, expect } from "@jest/globals";
import { createComponentLogger, createRequestLogger } from "@/utils/LoggerContext";
import * as path from "path";
import { createLogger, rotatingFileName } from "@/config/logger";

describe("LoggerContext", () => {
  const logger = createLogger({ level: "silent", serviceName: "test", env: "test" });

  it("request 로거는 request_id/method/path 바인딩", () => {
    const child = createRequestLogger(logger, "req-1", "GET", "/products");

    expect(child.bindings()).toEqual({
      service: "test",
      env: "test",
      request_id: "req-1",
      method: "GET",
      path: "/products",
    });
  });

  it("component 로거는 component 바인딩", () => {
    expect(createComponentLogger(logger, "database").bindings()).toEqual({
      service: "test",
      env: "test",
      component: "database",
    });
  });

  it("createLogger는 설정한 레벨 사용", () => {
    expect(logger.level).toBe("silent");
  });

  it("로테이션 파일은 로컬 날짜 디렉토리에 생성", () => {
    // 로컬 자정 직후 (UTC 기준으로는 전날일 수 있음)
    const justAfterMidnight = new Date(2025, 0, 5, 0, 30);

    expect(rotatingFileName("server")(justAfterMidnight)).toBe(
      path.join("2025-01-05", "server.log"),
    );
  });
});
