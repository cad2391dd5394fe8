/**
 * Products API 통합 테스트
 *
 * createApp + ProductService + in-memory Repository
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import request from "supertest";
import type { Express } from "express";
import { createApp } from "@/app";
import { ProductService } from "@/services/ProductService";
import type { IHealthProbe } from "@/core/interfaces/IHealthProbe";
import type { IProductRepository } from "@/core/interfaces/IProductRepository";
import { InMemoryProductRepository } from "../helpers/InMemoryProductRepository";
import { silentLogger } from "../helpers/testLogger";

const healthyProbe: IHealthProbe = { ping: () => Promise.resolve() };

const lamp = {
  name: "Desk Lamp",
  description: "LED desk lamp",
  price: 19.99,
  categories: ["home", "lighting"],
};

function buildApp(repository: IProductRepository): Express {
  return createApp({
    productService: new ProductService(repository, silentLogger),
    healthProbe: healthyProbe,
    logger: silentLogger,
  });
}

describe("Products API", () => {
  let repository: InMemoryProductRepository;
  let app: Express;

  beforeEach(() => {
    repository = new InMemoryProductRepository();
    app = buildApp(repository);
  });

  describe("POST /products", () => {
    it("201 + 생성된 상품 (snake_case 타임스탬프)", async () => {
      const res = await request(app).post("/products").send(lamp);

      expect(res.status).toBe(201);
      expect(res.body).toEqual({
        id: 1,
        ...lamp,
        created_at: "2025-01-01T00:00:00.000Z",
        updated_at: "2025-01-01T00:00:00.000Z",
      });
    });

    it("x-request-id 헤더를 그대로 응답", async () => {
      const res = await request(app)
        .post("/products")
        .set("x-request-id", "req-123")
        .send(lamp);

      expect(res.headers["x-request-id"]).toBe("req-123");
    });

    it("값 제약 위반은 400 plain text", async () => {
      const res = await request(app)
        .post("/products")
        .send({ ...lamp, price: -1 });

      expect(res.status).toBe(400);
      expect(res.headers["content-type"]).toBe("text/plain; charset=utf-8");
      expect(res.text).toBe("invalid input: price: must be >= 0");
      expect(repository.calls.create).toBe(0);
    });

    it("필드 타입 오류는 400", async () => {
      const res = await request(app)
        .post("/products")
        .send({ ...lamp, price: "10" });

      expect(res.status).toBe(400);
      expect(res.text).toBe(
        "invalid input: price: Expected number, received string",
      );
    });

    it("잘못된 JSON은 400 Invalid input", async () => {
      const res = await request(app)
        .post("/products")
        .set("Content-Type", "application/json")
        .send("{\"name\": ");

      expect(res.status).toBe(400);
      expect(res.text).toBe("Invalid input");
    });

    it("앞뒤 공백 포함 255자 초과 이름은 400", async () => {
      const res = await request(app)
        .post("/products")
        .send({ ...lamp, name: `${" ".repeat(300)}Lamp` });

      expect(res.status).toBe(400);
      expect(res.text).toBe(
        "invalid input: name: must be at most 255 characters",
      );
      expect(repository.calls.create).toBe(0);
    });

    it("객체가 아닌 JSON 바디는 400", async () => {
      const res = await request(app).post("/products").send([lamp]);

      expect(res.status).toBe(400);
      expect(res.text).toBe(
        "invalid input: request body must be a JSON object",
      );
    });
  });

  describe("GET /products/:id", () => {
    it("200 + 상품", async () => {
      await request(app).post("/products").send(lamp);

      const res = await request(app).get("/products/1");

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ id: 1, name: "Desk Lamp" });
    });

    it("없는 id는 404 product not found", async () => {
      const res = await request(app).get("/products/999");

      expect(res.status).toBe(404);
      expect(res.text).toBe("product not found");
    });

    it.each(["abc", "0", "-3", "1.5", "99999999999999999999"])(
      "id %s는 400 Invalid product ID",
      async (id) => {
        const res = await request(app).get(`/products/${id}`);

        expect(res.status).toBe(400);
        expect(res.text).toBe("Invalid product ID");
        expect(repository.calls.findById).toBe(0);
      },
    );
  });

  describe("GET /products", () => {
    it("빈 목록은 기본 페이지네이션과 함께 반환", async () => {
      const res = await request(app).get("/products");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        products: [],
        total_count: 0,
        page: 1,
        limit: 10,
      });
    });

    it("25건 중 page=2&limit=10은 최신순 11~20번째", async () => {
      for (let i = 1; i <= 25; i++) {
        await request(app)
          .post("/products")
          .send({ ...lamp, name: `Item ${i}`, price: i });
      }

      const res = await request(app).get("/products?page=2&limit=10");

      expect(res.status).toBe(200);
      expect(res.body.total_count).toBe(25);
      expect(res.body.page).toBe(2);
      expect(res.body.limit).toBe(10);
      expect(res.body.products.map((p: { id: number }) => p.id)).toEqual([
        15, 14, 13, 12, 11, 10, 9, 8, 7, 6,
      ]);
    });

    it("가격 범위 + 카테고리 필터", async () => {
      await request(app).post("/products").send({ ...lamp, price: 10 });
      await request(app)
        .post("/products")
        .send({ ...lamp, price: 20, categories: ["kitchen"] });
      await request(app).post("/products").send({ ...lamp, price: 30 });

      const res = await request(app).get(
        "/products?min_price=10&max_price=20&category_id=Home",
      );

      expect(res.status).toBe(200);
      expect(res.body.total_count).toBe(1);
      expect(res.body.products.map((p: { id: number }) => p.id)).toEqual([1]);
    });

    it.each([
      ["min_price=abc", "invalid input: min_price: must be a number"],
      ["page=1.5", "invalid input: page: must be an integer"],
      ["page=1&page=2", "invalid input: page: must be a single value"],
      ["limit=101", "invalid input: limit: must be <= 100"],
      ["limit=0", "invalid input: limit: must be >= 1"],
      [
        "page=100000000000000000000&limit=100",
        "invalid input: page: is too large",
      ],
      [
        "min_price=30&max_price=10",
        "invalid input: min_price: must be <= max_price",
      ],
    ])("?%s는 400", async (query, body) => {
      const res = await request(app).get(`/products?${query}`);

      expect(res.status).toBe(400);
      expect(res.text).toBe(body);
      expect(repository.calls.list).toBe(0);
    });
  });

  describe("PUT /products/:id", () => {
    it("부분 업데이트 후 204, null 필드는 변경 없음", async () => {
      await request(app).post("/products").send(lamp);

      const res = await request(app)
        .put("/products/1")
        .send({ price: 5, name: null });

      expect(res.status).toBe(204);
      expect(res.text).toBe("");

      const after = await request(app).get("/products/1");
      expect(after.body).toMatchObject({
        name: "Desk Lamp",
        price: 5,
        updated_at: "2025-01-01T00:00:01.000Z",
      });
    });

    it("없는 id는 404", async () => {
      const res = await request(app).put("/products/3").send({ price: 1 });

      expect(res.status).toBe(404);
      expect(res.text).toBe("product not found");
    });

    it("잘못된 id는 400", async () => {
      const res = await request(app).put("/products/x").send({ price: 1 });

      expect(res.status).toBe(400);
      expect(res.text).toBe("Invalid product ID");
    });

    it("빈 카테고리 목록은 400", async () => {
      await request(app).post("/products").send(lamp);

      const res = await request(app).put("/products/1").send({ categories: [] });

      expect(res.status).toBe(400);
      expect(res.text).toBe(
        "invalid input: categories: must contain at least one category",
      );
    });
  });

  describe("DELETE /products/:id", () => {
    it("204 후 조회하면 404", async () => {
      await request(app).post("/products").send(lamp);

      const res = await request(app).delete("/products/1");
      expect(res.status).toBe(204);

      const after = await request(app).get("/products/1");
      expect(after.status).toBe(404);
    });

    it("없는 id는 404", async () => {
      const res = await request(app).delete("/products/1");

      expect(res.status).toBe(404);
      expect(res.text).toBe("product not found");
    });
  });

  describe("에러 응답", () => {
    it("저장소 오류는 500 Internal server error", async () => {
      const broken: IProductRepository = {
        create: () => Promise.reject(new Error("db down")),
        findById: () => Promise.reject(new Error("db down")),
        list: () => Promise.reject(new Error("db down")),
        update: () => Promise.reject(new Error("db down")),
        delete: () => Promise.reject(new Error("db down")),
      };

      const res = await request(buildApp(broken)).get("/products");

      expect(res.status).toBe(500);
      expect(res.text).toBe("Internal server error");
    });

    it("알 수 없는 경로는 404 Not found", async () => {
      const res = await request(app).get("/unknown");

      expect(res.status).toBe(404);
      expect(res.text).toBe("Not found");
    });
  });
});
