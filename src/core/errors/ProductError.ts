/**
 * Product 에러 타입
 *
 * 레이어 간 에러 종류 전달용
 * - Repository: 드라이버 에러 → StorageError, 0건 → ProductNotFoundError
 * - Service: 검증 실패 → InvalidInputError
 * - errorHandler 미들웨어: code → HTTP 상태 코드
 */

/**
 * Product 에러 코드
 */
export enum ProductErrorCode {
  /** 입력 구조/값 검증 실패 */
  INVALID_INPUT = "INVALID_INPUT",

  /** 일치하는 레코드 없음 */
  PRODUCT_NOT_FOUND = "PRODUCT_NOT_FOUND",

  /** DB 또는 인코딩 오류 */
  STORAGE_ERROR = "STORAGE_ERROR",
}

/**
 * Product 에러 기본 클래스
 */
export class ProductError extends Error {
  public readonly code: ProductErrorCode;
  public readonly errorCause?: unknown;

  constructor(
    code: ProductErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message);
    this.name = "ProductError";
    this.code = code;
    this.errorCause = options?.cause;
  }

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.code,
      message: this.message,
      cause:
        this.errorCause instanceof Error
          ? { message: this.errorCause.message, name: this.errorCause.name }
          : this.errorCause,
      stack: this.stack,
    };
  }
}

/**
 * 입력 검증 실패
 */
export class InvalidInputError extends ProductError {
  public readonly details: string[];

  /**
   * @param message - 응답 메시지 (기본값: "invalid input: <details>")
   */
  constructor(details: string[], message?: string) {
    super(
      ProductErrorCode.INVALID_INPUT,
      message ??
        (details.length > 0
          ? `invalid input: ${details.join("; ")}`
          : "invalid input"),
    );
    this.name = "InvalidInputError";
    this.details = details;
  }
}

/**
 * 상품 없음 (sentinel)
 */
export class ProductNotFoundError extends ProductError {
  public readonly productId: number;

  constructor(productId: number) {
    super(ProductErrorCode.PRODUCT_NOT_FOUND, "product not found");
    this.name = "ProductNotFoundError";
    this.productId = productId;
  }

  toLogObject(): Record<string, unknown> {
    return { ...super.toLogObject(), productId: this.productId };
  }
}

/**
 * 저장소 오류 (DB 드라이버 에러, 행 파싱 실패 등)
 */
export class StorageError extends ProductError {
  constructor(message: string, cause?: unknown) {
    super(ProductErrorCode.STORAGE_ERROR, message, { cause });
    this.name = "StorageError";
  }
}

/**
 * ProductError 여부 확인
 */
export function isProductError(error: unknown): error is ProductError {
  return error instanceof ProductError;
}
