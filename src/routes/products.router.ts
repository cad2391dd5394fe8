/**
 * Products API 라우터
 *
 * - POST   /products
 * - GET    /products
 * - GET    /products/:id
 * - PUT    /products/:id
 * - DELETE /products/:id
 *
 * 요청 디코딩 → 서비스 호출 → JSON 응답
 * 에러는 next()로 넘겨 errorHandler에서 상태 코드 매핑
 */

import { Router, Request, Response, NextFunction } from "express";
import type { IProductService } from "@/core/interfaces/IProductService";
import {
  decodeCreateBody,
  decodeUpdateBody,
  parseListQuery,
  parseProductId,
} from "@/middleware/validation";

export function createProductsRouter(service: IProductService): Router {
  const router = Router();

  /**
   * POST /products
   *
   * Request Body:
   * {
   *   "name": "Desk Lamp",
   *   "description": "LED lamp",
   *   "price": 19.99,
   *   "categories": ["home", "lighting"]
   * }
   *
   * Response: 201 + Product
   */
  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = decodeCreateBody(req.body);
      const product = await service.createProduct(input);
      res.status(201).json(product);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /products?category_id=&min_price=&max_price=&search=&page=&limit=
   *
   * Response:
   * {
   *   "products": [ ... ],
   *   "total_count": 42,
   *   "page": 1,
   *   "limit": 10
   * }
   */
  router.get("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { filter, pagination } = parseListQuery(req.query);
      const { products, totalCount } = await service.listProducts(
        filter,
        pagination,
      );

      res.status(200).json({
        products,
        total_count: totalCount,
        page: pagination.page,
        limit: pagination.limit,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /products/:id
   */
  router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseProductId(req.params.id);
      const product = await service.getProductById(id);
      res.status(200).json(product);
    } catch (error) {
      next(error);
    }
  });

  /**
   * PUT /products/:id
   *
   * 부분 업데이트 (없는 필드/ null 필드는 변경하지 않음)
   * Response: 204 (바디 없음)
   */
  router.put("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseProductId(req.params.id);
      const input = decodeUpdateBody(req.body);
      await service.updateProduct(id, input);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /products/:id
   * Response: 204 (바디 없음)
   */
  router.delete(
    "/:id",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const id = parseProductId(req.params.id);
        await service.deleteProduct(id);
        res.status(204).end();
      } catch (error) {
        next(error);
      }
    },
  );

  return router;
}
