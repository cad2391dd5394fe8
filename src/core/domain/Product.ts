/**
 * Product 도메인 모델
 *
 * - products 테이블 레코드 (ProductRowSchema)
 * - 생성/수정 입력 (디코딩 스키마 + 검증 스키마)
 * - 목록 조회 필터 및 페이지네이션
 */

import { z } from "zod";
import { PRODUCT_CONSTRAINTS, PAGINATION_CONFIG } from "@/config/constants";

/**
 * products 테이블 레코드 스키마
 *
 * Note: pg는 NUMERIC을 문자열로 반환하므로 price는 coerce 처리
 * Note: description은 DB상 nullable (입력 시에는 필수)
 */
export const ProductRowSchema = z.object({
  id: z.coerce.number().int(),
  name: z.string(),
  description: z.string().nullable(),
  price: z.coerce.number(),
  categories: z.array(z.string()),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

/**
 * Product 타입 (API 응답 형태와 동일)
 */
export type Product = z.infer<typeof ProductRowSchema>;

// ============================================
// 입력 디코딩 스키마 (JSON 타입만 확인)
// ============================================

/**
 * 생성 요청 바디 디코딩
 * 필드 존재 여부와 JSON 타입만 확인, 값 제약은 서비스에서 검증
 */
export const CreateProductBodySchema = z.object({
  name: z.string(),
  description: z.string(),
  price: z.number(),
  categories: z.array(z.string()),
});

export type CreateProductInput = z.infer<typeof CreateProductBodySchema>;

/**
 * null은 "변경 없음"으로 취급
 */
const nullToUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((val) => (val === null ? undefined : val), schema.optional());

/**
 * 수정 요청 바디 디코딩 (부분 업데이트)
 */
export const UpdateProductBodySchema = z.object({
  name: nullToUndefined(z.string()),
  description: nullToUndefined(z.string()),
  price: nullToUndefined(z.number()),
  categories: nullToUndefined(z.array(z.string())),
});

/**
 * 부분 업데이트 입력
 * 키가 없으면 해당 컬럼은 변경하지 않음
 */
export interface UpdateProductInput {
  name?: string;
  description?: string;
  price?: number;
  categories?: string[];
}

// ============================================
// 검증 스키마 (서비스 레이어)
// ============================================

/**
 * 문자 수 (VARCHAR 기준, 서로게이트 쌍은 1자)
 */
const characterCount = (value: string): number => [...value].length;

// 길이는 저장되는 원본 기준, 공백만 있는지는 trim 기준
const nameRule = z
  .string()
  .refine(
    (value) => characterCount(value) <= PRODUCT_CONSTRAINTS.NAME_MAX_LENGTH,
    `must be at most ${PRODUCT_CONSTRAINTS.NAME_MAX_LENGTH} characters`,
  )
  .refine((value) => value.trim().length > 0, "must not be empty");

const descriptionRule = z.string().trim().min(1, "must not be empty");

const priceRule = z
  .number()
  .finite("must be a finite number")
  .min(0, "must be >= 0")
  // NUMERIC(10, 2)는 반올림 후 범위를 확인함
  .lt(
    PRODUCT_CONSTRAINTS.PRICE_ROUNDING_LIMIT,
    `must be < ${PRODUCT_CONSTRAINTS.PRICE_UPPER_BOUND} after rounding to 2 decimals`,
  );

const categoriesRule = z
  .array(z.string().trim().min(1, "must not be empty"))
  .min(1, "must contain at least one category");

/**
 * 생성 입력 검증 규칙
 *
 * trim은 검증에만 사용하고, 저장되는 값은 원본 입력 그대로
 */
export const CreateProductRules = z.object({
  name: nameRule,
  description: descriptionRule,
  price: priceRule,
  categories: categoriesRule,
});

/**
 * 수정 입력 검증 규칙 (존재하는 필드만)
 */
export const UpdateProductRules = z.object({
  name: nameRule.optional(),
  description: descriptionRule.optional(),
  price: priceRule.optional(),
  categories: categoriesRule.optional(),
});

// ============================================
// 목록 조회
// ============================================

/**
 * 목록 필터 (모든 조건 AND 결합)
 */
export interface ProductFilter {
  /** 카테고리 부분 일치 (대소문자 무시) */
  category?: string;
  /** 최소 가격 (포함) */
  minPrice?: number;
  /** 최대 가격 (포함) */
  maxPrice?: number;
  /** name/description 전문 검색 */
  search?: string;
}

export const ProductFilterRules = z
  .object({
    category: z.string().optional(),
    minPrice: z.number().finite().min(0, "must be >= 0").optional(),
    maxPrice: z.number().finite().min(0, "must be >= 0").optional(),
    search: z.string().optional(),
  })
  .refine(
    (filter) =>
      filter.minPrice === undefined ||
      filter.maxPrice === undefined ||
      filter.minPrice <= filter.maxPrice,
    { message: "must be <= max_price", path: ["minPrice"] },
  );

export const PaginationParamsSchema = z
  .object({
    page: z.number().int("must be an integer").min(1, "must be >= 1"),
    limit: z
      .number()
      .int("must be an integer")
      .min(1, "must be >= 1")
      .max(
        PAGINATION_CONFIG.MAX_LIMIT,
        `must be <= ${PAGINATION_CONFIG.MAX_LIMIT}`,
      ),
  })
  // OFFSET은 정수로 직렬화되어야 함 (안전 정수 범위는 int8 범위 안)
  .refine(
    (pagination) =>
      Number.isSafeInteger((pagination.page - 1) * pagination.limit),
    { message: "is too large", path: ["page"] },
  );

export type PaginationParams = z.infer<typeof PaginationParamsSchema>;

/**
 * 목록 조회 결과
 */
export interface ProductPage {
  products: Product[];
  /** 페이지네이션과 무관한 전체 매칭 건수 */
  totalCount: number;
}
