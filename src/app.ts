/**
 * Express 앱 구성
 *
 * 미들웨어 → 라우터 → 404 → 에러 핸들러 순서
 * 의존성은 모두 인자로 주입 (테스트에서 fake로 교체)
 */

import express, { Express } from "express";
import type { Logger } from "@/config/logger";
import type { IProductService } from "@/core/interfaces/IProductService";
import type { IHealthProbe } from "@/core/interfaces/IHealthProbe";
import { SERVER_DEFAULTS } from "@/config/constants";
import { requestLogger } from "@/middleware/requestLogger";
import { errorHandler, notFoundHandler } from "@/middleware/errorHandler";
import { createProductsRouter } from "@/routes/products.router";
import { createHealthRouter } from "@/routes/health.router";

export interface AppDependencies {
  productService: IProductService;
  healthProbe: IHealthProbe;
  logger: Logger;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(requestLogger(deps.logger));
  app.use(express.json({ limit: SERVER_DEFAULTS.JSON_BODY_LIMIT }));

  app.use("/health", createHealthRouter(deps.healthProbe, deps.logger));
  app.use("/products", createProductsRouter(deps.productService));

  app.use(notFoundHandler(deps.logger));
  app.use(errorHandler(deps.logger));

  return app;
}
