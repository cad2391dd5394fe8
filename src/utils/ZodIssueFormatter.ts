/**
 * Zod 검증 이슈 포맷터
 */

import { z } from "zod";

/**
 * 필드명 매핑 (에러 메시지는 API 파라미터명 기준)
 */
const FIELD_LABELS: Record<string, string> = {
  minPrice: "min_price",
  maxPrice: "max_price",
  category: "category_id",
};

/**
 * Zod 이슈 → "<path>: <message>" 목록
 *
 * 예: ["categories", 1] → "categories[1]: must not be empty"
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path
      .map((segment) =>
        typeof segment === "string"
          ? (FIELD_LABELS[segment] ?? segment)
          : `[${segment}]`,
      )
      .join(".")
      .replace(/\.\[/g, "[");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
