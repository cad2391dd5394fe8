/**
 * 애플리케이션 상수
 *
 * 런타임 설정(DB 접속 정보, 포트 등)은 ConfigLoader가 담당하고,
 * 여기에는 코드에 고정된 값만 둔다.
 */

/**
 * 애플리케이션 메타데이터
 *
 * ⚠️ VERSION은 package.json의 version과 수동 동기화
 */
export const APP_METADATA = {
  VERSION: "1.0.0",
  NAME: "Product Catalog API",
} as const;

/**
 * 데이터베이스 설정
 */
export const DATABASE_CONFIG = {
  /**
   * 상품 테이블명
   */
  PRODUCT_TABLE_NAME: "products",

  /**
   * 전문 검색 언어 설정 (to_tsvector / plainto_tsquery)
   * 마이그레이션의 GIN 인덱스와 동일해야 인덱스가 사용됨
   */
  TEXT_SEARCH_CONFIG: "english",

  /**
   * 기본 SELECT 필드 목록
   */
  PRODUCT_FIELDS: [
    "id",
    "name",
    "description",
    "price",
    "categories",
    "created_at",
    "updated_at",
  ] as const,
} as const;

/**
 * 페이지네이션 설정
 */
export const PAGINATION_CONFIG = {
  /** 쿼리에 page가 없을 때 */
  DEFAULT_PAGE: 1,

  /** 쿼리에 limit가 없을 때 */
  DEFAULT_LIMIT: 10,

  MAX_LIMIT: 100,
} as const;

/**
 * 상품 필드 제약
 */
export const PRODUCT_CONSTRAINTS = {
  /** VARCHAR(255) */
  NAME_MAX_LENGTH: 255,

  /** NUMERIC(10, 2) 상한 (미포함) */
  PRICE_UPPER_BOUND: 100_000_000,

  /** 소수 둘째 자리 반올림 시 PRICE_UPPER_BOUND가 되는 최소값 */
  PRICE_ROUNDING_LIMIT: 99_999_999.995,
} as const;

/**
 * 서버 설정 기본값
 */
export const SERVER_DEFAULTS = {
  /**
   * 종료 시 진행 중인 요청 대기 시간 (ms)
   * 초과하면 남은 연결을 강제로 끊음
   */
  SHUTDOWN_TIMEOUT_MS: 5000,

  /** JSON 요청 바디 최대 크기 */
  JSON_BODY_LIMIT: "1mb",
} as const;

/**
 * 로깅 서비스 이름
 */
export const SERVICE_NAMES = {
  SERVER: "server",
  PRODUCT_SERVICE: "product-service",
  PRODUCT_REPOSITORY: "product-repository",
  DATABASE: "database",
} as const;
