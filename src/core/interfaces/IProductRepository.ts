/**
 * Product Repository 인터페이스
 *
 * SOLID 원칙:
 * - DIP: 서비스는 이 추상화에만 의존 (PostgreSQL 구체 구현에 의존하지 않음)
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
 * Product Repository 인터페이스
 *
 * 실패 시:
 * - 레코드 없음 → ProductNotFoundError
 * - 그 외 DB 오류 → StorageError
 */
export interface IProductRepository {
  /**
   * 상품 생성
   * @returns id와 타임스탬프가 채워진 상품
   */
  create(input: CreateProductInput): Promise<Product>;

  /**
   * 상품 ID로 조회
   */
  findById(id: number): Promise<Product>;

  /**
   * 필터 + 페이지네이션 목록 조회
   * totalCount는 페이지네이션과 무관한 전체 매칭 건수
   */
  list(filter: ProductFilter, pagination: PaginationParams): Promise<ProductPage>;

  /**
   * 부분 업데이트 (입력에 있는 필드 + updated_at만 변경)
   */
  update(id: number, input: UpdateProductInput): Promise<void>;

  /**
   * 상품 삭제
   */
  delete(id: number): Promise<void>;
}
