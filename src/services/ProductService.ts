/**
 * Product Service
 *
 * 역할:
 * - 입력 검증 (Zod 규칙) → 실패 시 InvalidInputError, Repository 호출 없음
 * - Repository 에러 종류 전달 (NotFound/Storage는 그대로)
 * - 그 외 예외는 StorageError로 래핑
 */

import { z } from "zod";
import { formatIssues } from "@/utils/ZodIssueFormatter";
import { IProductRepository } from "@/core/interfaces/IProductRepository";
import { IProductService } from "@/core/interfaces/IProductService";
import {
  CreateProductInput,
  CreateProductRules,
  PaginationParams,
  PaginationParamsSchema,
  Product,
  ProductFilter,
  ProductFilterRules,
  ProductPage,
  UpdateProductInput,
  UpdateProductRules,
} from "@/core/domain/Product";
import {
  InvalidInputError,
  StorageError,
  isProductError,
} from "@/core/errors/ProductError";
import type { Logger } from "@/config/logger";

export class ProductService implements IProductService {
  constructor(
    private readonly repository: IProductRepository,
    private readonly logger: Logger,
  ) {}

  async createProduct(input: CreateProductInput): Promise<Product> {
    this.validate(CreateProductRules, input);

    const product = await this.call(() => this.repository.create(input));
    this.logger.info({ product_id: product.id }, "[ProductService] 상품 생성");
    return product;
  }

  async getProductById(id: number): Promise<Product> {
    this.validateId(id);
    return this.call(() => this.repository.findById(id));
  }

  async listProducts(
    filter: ProductFilter,
    pagination: PaginationParams,
  ): Promise<ProductPage> {
    this.validate(PaginationParamsSchema, pagination);
    this.validate(ProductFilterRules, filter);

    return this.call(() => this.repository.list(filter, pagination));
  }

  async updateProduct(id: number, input: UpdateProductInput): Promise<void> {
    this.validateId(id);
    this.validate(UpdateProductRules, input);

    await this.call(() => this.repository.update(id, input));
    this.logger.info(
      {
        product_id: id,
        fields: Object.entries(input)
          .filter(([, value]) => value !== undefined)
          .map(([key]) => key),
      },
      "[ProductService] 상품 수정",
    );
  }

  async deleteProduct(id: number): Promise<void> {
    this.validateId(id);

    await this.call(() => this.repository.delete(id));
    this.logger.info({ product_id: id }, "[ProductService] 상품 삭제");
  }

  private validate(schema: z.ZodTypeAny, value: unknown): void {
    const result = schema.safeParse(value);
    if (!result.success) {
      const details = formatIssues(result.error);
      this.logger.debug({ details }, "[ProductService] 입력 검증 실패");
      throw new InvalidInputError(details);
    }
  }

  private validateId(id: number): void {
    if (!Number.isSafeInteger(id) || id < 1) {
      throw new InvalidInputError(["id: must be a positive integer"], "Invalid product ID");
    }
  }

  /**
   * Repository 호출
   * ProductError는 그대로, 그 외는 StorageError로 래핑
   */
  private async call<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (isProductError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ error: message }, "[ProductService] 예상치 못한 오류");
      throw new StorageError(message, error);
    }
  }
}
