/**
 * PostgreSQL Product Repository 구현
 *
 * SOLID 원칙:
 * - SRP: products 테이블과의 데이터 통신만 담당
 * - DIP: IProductRepository 인터페이스 구현
 *
 * 동적 WHERE / SET 절은 QueryBuilder로 조립한다.
 * 필터 파라미터와 페이지네이션 파라미터는 별도 목록으로 유지해
 * COUNT 쿼리에는 필터 값만 전달된다.
 */

import type { QueryResultRow } from "pg";
import { ISqlExecutor } from "@/core/interfaces/ISqlExecutor";
import { IProductRepository } from "@/core/interfaces/IProductRepository";
import {
  CreateProductInput,
  PaginationParams,
  Product,
  ProductFilter,
  ProductPage,
  ProductRowSchema,
  UpdateProductInput,
} from "@/core/domain/Product";
import {
  ProductNotFoundError,
  StorageError,
} from "@/core/errors/ProductError";
import { DATABASE_CONFIG } from "@/config/constants";
import type { Logger } from "@/config/logger";
import {
  QueryParams,
  SetClause,
  WhereClause,
  escapeLikePattern,
} from "./sql/QueryBuilder";

const TABLE = DATABASE_CONFIG.PRODUCT_TABLE_NAME;
const FIELDS = DATABASE_CONFIG.PRODUCT_FIELDS.join(", ");
const TS_CONFIG = DATABASE_CONFIG.TEXT_SEARCH_CONFIG;

/**
 * 목록 필터 → WHERE 절
 * 빈 문자열 조건은 무시
 */
export function buildFilterClause(filter: ProductFilter): WhereClause {
  const where = new WhereClause();

  if (filter.category !== undefined && filter.category !== "") {
    where.and(
      (p) =>
        `EXISTS (SELECT 1 FROM unnest(categories) AS category WHERE category ILIKE ${p})`,
      `%${escapeLikePattern(filter.category)}%`,
    );
  }

  if (filter.minPrice !== undefined) {
    where.and((p) => `price >= ${p}`, filter.minPrice);
  }

  if (filter.maxPrice !== undefined) {
    where.and((p) => `price <= ${p}`, filter.maxPrice);
  }

  if (filter.search !== undefined && filter.search !== "") {
    where.and(
      (p) =>
        `(to_tsvector('${TS_CONFIG}', name) @@ plainto_tsquery('${TS_CONFIG}', ${p})` +
        ` OR to_tsvector('${TS_CONFIG}', description) @@ plainto_tsquery('${TS_CONFIG}', ${p}))`,
      filter.search,
    );
  }

  return where;
}

/**
 * PostgreSQL Product Repository
 */
export class PostgresProductRepository implements IProductRepository {
  constructor(
    private readonly db: ISqlExecutor,
    private readonly logger: Logger,
  ) {}

  async create(input: CreateProductInput): Promise<Product> {
    const params = new QueryParams();
    const sql =
      `INSERT INTO ${TABLE} (name, description, price, categories)` +
      ` VALUES (${params.add(input.name)}, ${params.add(input.description)}, ${params.add(input.price)}, ${params.add(input.categories)})` +
      ` RETURNING ${FIELDS}`;

    const rows = await this.execute("creating product", sql, params.values);
    const row = rows[0];
    if (row === undefined) {
      throw new StorageError("error creating product: no row returned");
    }

    const product = this.toProduct(row);
    this.logger.info({ product_id: product.id }, "[Repository] 상품 생성 완료");
    return product;
  }

  async findById(id: number): Promise<Product> {
    const params = new QueryParams();
    const sql = `SELECT ${FIELDS} FROM ${TABLE} WHERE id = ${params.add(id)}`;

    const rows = await this.execute("getting product", sql, params.values);
    const row = rows[0];
    if (row === undefined) {
      this.logger.debug({ product_id: id }, "[Repository] 상품을 찾을 수 없음");
      throw new ProductNotFoundError(id);
    }

    return this.toProduct(row);
  }

  async list(
    filter: ProductFilter,
    pagination: PaginationParams,
  ): Promise<ProductPage> {
    const where = buildFilterClause(filter);
    const whereSql = where.toSql();

    // 필터 값 복사본에 LIMIT/OFFSET 추가 (COUNT 쿼리는 원본 사용)
    const pageParams = where.params.clone();
    const limitRef = pageParams.add(pagination.limit);
    const offsetRef = pageParams.add((pagination.page - 1) * pagination.limit);

    const listSql =
      `SELECT ${FIELDS} FROM ${TABLE}${whereSql}` +
      ` ORDER BY created_at DESC, id DESC LIMIT ${limitRef} OFFSET ${offsetRef}`;
    const countSql = `SELECT COUNT(*) AS total_count FROM ${TABLE}${whereSql}`;

    const rows = await this.execute("listing products", listSql, pageParams.values);
    const countRows = await this.execute(
      "counting products",
      countSql,
      where.params.values,
    );

    const products = rows.map((row) => this.toProduct(row));
    const totalCount = this.toCount(countRows[0]);

    this.logger.debug(
      { count: products.length, total_count: totalCount },
      "[Repository] 목록 조회 완료",
    );

    return { products, totalCount };
  }

  async update(id: number, input: UpdateProductInput): Promise<void> {
    const set = new SetClause();

    if (input.name !== undefined) {
      set.assign("name", input.name);
    }
    if (input.description !== undefined) {
      set.assign("description", input.description);
    }
    if (input.price !== undefined) {
      set.assign("price", input.price);
    }
    if (input.categories !== undefined) {
      set.assign("categories", input.categories);
    }
    set.assignExpression("updated_at", "NOW()");

    const sql = `UPDATE ${TABLE} SET ${set.toSql()} WHERE id = ${set.params.add(id)}`;

    const rowCount = await this.executeCommand("updating product", sql, set.params.values);
    if (rowCount === 0) {
      throw new ProductNotFoundError(id);
    }

    this.logger.info({ product_id: id }, "[Repository] 상품 수정 완료");
  }

  async delete(id: number): Promise<void> {
    const params = new QueryParams();
    const sql = `DELETE FROM ${TABLE} WHERE id = ${params.add(id)}`;

    const rowCount = await this.executeCommand("deleting product", sql, params.values);
    if (rowCount === 0) {
      throw new ProductNotFoundError(id);
    }

    this.logger.info({ product_id: id }, "[Repository] 상품 삭제 완료");
  }

  /**
   * SELECT / RETURNING 실행
   * 드라이버 에러는 StorageError로 래핑
   */
  private async execute(
    action: string,
    sql: string,
    values: unknown[],
  ): Promise<QueryResultRow[]> {
    try {
      const result = await this.db.query(sql, values);
      return result.rows;
    } catch (error) {
      throw this.wrapError(action, error);
    }
  }

  /**
   * UPDATE / DELETE 실행
   * @returns 영향받은 행 수
   */
  private async executeCommand(
    action: string,
    sql: string,
    values: unknown[],
  ): Promise<number> {
    try {
      const result = await this.db.query(sql, values);
      return result.rowCount ?? 0;
    } catch (error) {
      throw this.wrapError(action, error);
    }
  }

  private wrapError(action: string, error: unknown): StorageError {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error({ error: message, action }, "[Repository] 쿼리 실패");
    return new StorageError(`error ${action}: ${message}`, error);
  }

  /**
   * DB 레코드 → Product (Zod 검증)
   */
  private toProduct(row: QueryResultRow): Product {
    const parsed = ProductRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new StorageError(
        `error decoding product row: ${parsed.error.errors
          .map((e) => `${e.path.join(".")}: ${e.message}`)
          .join(", ")}`,
        parsed.error,
      );
    }
    return parsed.data;
  }

  private toCount(row: QueryResultRow | undefined): number {
    // COUNT(*)는 bigint → 문자열로 반환됨
    const total = Number(row?.total_count);
    if (!Number.isSafeInteger(total)) {
      throw new StorageError("error counting products: invalid count row");
    }
    return total;
  }
}
