/**
 * Product Service 인터페이스
 */

import {
  CreateProductInput,
  PaginationParams,
  Product,
  ProductFilter,
  ProductPage,
  UpdateProductInput,
} from "@/core/domain/Product";

/**
 * Product Service 인터페이스
 *
 * 실패 시 ProductError 계열만 던짐
 * (InvalidInputError, ProductNotFoundError, StorageError)
 */
export interface IProductService {
  createProduct(input: CreateProductInput): Promise<Product>;

  getProductById(id: number): Promise<Product>;

  listProducts(
    filter: ProductFilter,
    pagination: PaginationParams,
  ): Promise<ProductPage>;

  updateProduct(id: number, input: UpdateProductInput): Promise<void>;

  deleteProduct(id: number): Promise<void>;
}
