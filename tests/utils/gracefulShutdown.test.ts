/**
 * HTTP 서버 종료 유틸리티 테스트
 */

import { describe, it, expect } from "@jest/globals";
import * as http from "http";
import type { AddressInfo } from "net";
import { closeServer, listen, waitForShutdownSignal } from "@/utils/gracefulShutdown";

function portOf(server: http.Server): number {
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server is not listening on a TCP port");
  }
  return address.port;
}

describe("closeServer", () => {
  it("진행 중인 요청이 없으면 graceful", async () => {
    const server = http.createServer((_req, res) => {
      res.end("ok");
    });
    await listen(server, 0);

    await expect(closeServer(server, 1000)).resolves.toBe("graceful");
    expect(server.listening).toBe(false);
  });

  it("대기 시간 내 끝나지 않는 요청은 강제 종료", async () => {
    let markReceived: () => void = () => undefined;
    const received = new Promise<void>((resolve) => {
      markReceived = resolve;
    });

    // 응답하지 않는 핸들러
    const server = http.createServer(() => {
      markReceived();
    });
    await listen(server, 0);

    const clientErrors: Error[] = [];
    const clientRequest = http.get({ port: portOf(server), path: "/slow" });
    clientRequest.on("error", (error) => {
      clientErrors.push(error);
    });

    await received;
    const result = await closeServer(server, 50);

    expect(result).toBe("forced");
    expect(server.listening).toBe(false);
  });
});

describe("listen", () => {
  it("이미 사용 중인 포트면 reject", async () => {
    const first = http.createServer();
    await listen(first, 0);

    const second = http.createServer();
    try {
      await expect(listen(second, portOf(first))).rejects.toMatchObject({
        code: "EADDRINUSE",
      });
    } finally {
      await closeServer(first, 1000);
    }
  });
});

describe("waitForShutdownSignal", () => {
  it("먼저 도착한 시그널로 resolve하고 리스너 해제", async () => {
    const before = process.listenerCount("SIGUSR2");

    const waiting = waitForShutdownSignal(["SIGUSR2"]);
    expect(process.listenerCount("SIGUSR2")).toBe(before + 1);

    process.emit("SIGUSR2", "SIGUSR2");

    await expect(waiting).resolves.toBe("SIGUSR2");
    expect(process.listenerCount("SIGUSR2")).toBe(before);
  });
});
