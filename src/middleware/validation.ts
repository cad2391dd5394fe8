/**
 * 요청 디코딩
 *
 * HTTP 입력(path/query/body) → 서비스 입력 타입 변환
 * 구조/타입 오류는 여기서 InvalidInputError (값 제약은 서비스에서 검증)
 */

import { z } from "zod";
import {
  CreateProductBodySchema,
  CreateProductInput,
  PaginationParams,
  ProductFilter,
  UpdateProductBodySchema,
  UpdateProductInput,
} from "@/core/domain/Product";
import { InvalidInputError } from "@/core/errors/ProductError";
import { PAGINATION_CONFIG } from "@/config/constants";
import { formatIssues } from "@/utils/ZodIssueFormatter";

/**
 * 빈 문자열을 undefined로 변환하는 전처리기
 */
const emptyToUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((val) => (val === "" ? undefined : val), schema.optional());

/**
 * 숫자 쿼리 파라미터 ("abc" → 실패, "" → 없음)
 */
const numericQuery = () =>
  emptyToUndefined(
    z
      .string({ invalid_type_error: "must be a single value" })
      .regex(/^\s*-?\d+(\.\d+)?\s*$/, "must be a number")
      .transform(Number),
  );

const integerQuery = () =>
  emptyToUndefined(
    z
      .string({ invalid_type_error: "must be a single value" })
      .regex(/^\s*-?\d+\s*$/, "must be an integer")
      .transform(Number),
  );

const textQuery = () =>
  emptyToUndefined(z.string({ invalid_type_error: "must be a single value" }));

/**
 * GET /products 쿼리 스키마
 */
export const ListProductsQuerySchema = z.object({
  category_id: textQuery(),
  min_price: numericQuery(),
  max_price: numericQuery(),
  search: textQuery(),
  page: integerQuery(),
  limit: integerQuery(),
});

const PRODUCT_ID_PATTERN = /^\d+$/;

/**
 * :id 파라미터 파싱
 * 양의 정수가 아니면 InvalidInputError("Invalid product ID")
 */
export function parseProductId(raw: string | undefined): number {
  const id = raw !== undefined && PRODUCT_ID_PATTERN.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new InvalidInputError(["id: must be a positive integer"], "Invalid product ID");
  }
  return id;
}

/**
 * 목록 쿼리 → 필터 + 페이지네이션
 * page/limit 미지정 시 기본값, 범위 검증은 서비스에서
 */
export function parseListQuery(query: unknown): {
  filter: ProductFilter;
  pagination: PaginationParams;
} {
  const result = ListProductsQuerySchema.safeParse(query);
  if (!result.success) {
    throw new InvalidInputError(formatIssues(result.error));
  }

  const q = result.data;
  return {
    filter: {
      category: q.category_id,
      minPrice: q.min_price,
      maxPrice: q.max_price,
      search: q.search,
    },
    pagination: {
      page: q.page ?? PAGINATION_CONFIG.DEFAULT_PAGE,
      limit: q.limit ?? PAGINATION_CONFIG.DEFAULT_LIMIT,
    },
  };
}

/**
 * 바디가 JSON 객체인지 확인
 */
function requireObject(body: unknown): void {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new InvalidInputError(["request body must be a JSON object"]);
  }
}

/**
 * POST /products 바디 디코딩
 */
export function decodeCreateBody(body: unknown): CreateProductInput {
  requireObject(body);
  const result = CreateProductBodySchema.safeParse(body);
  if (!result.success) {
    throw new InvalidInputError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * PUT /products/:id 바디 디코딩
 * null 필드는 제외 (변경 없음)
 */
export function decodeUpdateBody(body: unknown): UpdateProductInput {
  requireObject(body);
  const result = UpdateProductBodySchema.safeParse(body);
  if (!result.success) {
    throw new InvalidInputError(formatIssues(result.error));
  }

  const input: UpdateProductInput = {};
  const { name, description, price, categories } = result.data;
  if (name !== undefined) input.name = name;
  if (description !== undefined) input.description = description;
  if (price !== undefined) input.price = price;
  if (categories !== undefined) input.categories = categories;
  return input;
}
