/**
 * Health check 라우터
 *
 * GET /health
 * - DB ping 성공: 200 { status: "OK", timestamp }
 * - 실패: 503 "Service Unavailable"
 */

import { Router, Request, Response } from "express";
import type { IHealthProbe } from "@/core/interfaces/IHealthProbe";
import type { Logger } from "@/config/logger";
import { getTimestampWithTimezone } from "@/utils/timestamp";
import "@/types/express";

export function createHealthRouter(probe: IHealthProbe, logger: Logger): Router {
  const router = Router();

  router.get("/", async (req: Request, res: Response) => {
    const log = req.log ?? logger;

    try {
      await probe.ping();
    } catch (error) {
      log.error(
        { error: error instanceof Error ? error.message : String(error) },
        "[Health] DB health check 실패",
      );
      res.status(503).type("text/plain").send("Service Unavailable");
      return;
    }

    res.status(200).json({
      status: "OK",
      timestamp: getTimestampWithTimezone(),
    });
  });

  return router;
}
