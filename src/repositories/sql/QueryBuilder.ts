/**
 * 파라미터화 SQL 조각 빌더
 *
 * 값을 추가하는 순간 $n 플레이스홀더를 발급하므로
 * 플레이스홀더 번호와 values 배열 순서가 항상 일치한다.
 *
 * 사용 예:
 *   const where = new WhereClause();
 *   where.and((p) => `price >= ${p}`, 10);
 *   where.and((p) => `price <= ${p}`, 20);
 *   where.toSql();          // " WHERE price >= $1 AND price <= $2"
 *   where.params.values;    // [10, 20]
 */

/**
 * 플레이스홀더 발급 + 값 누적
 */
export class QueryParams {
  private readonly items: unknown[];

  constructor(initial: readonly unknown[] = []) {
    this.items = [...initial];
  }

  /**
   * 값 추가 후 플레이스홀더 반환 ($1, $2, ...)
   */
  add(value: unknown): string {
    this.items.push(value);
    return `$${this.items.length}`;
  }

  get values(): unknown[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * 현재까지의 값을 복사한 새 목록
   * 원본에 이후 추가되는 값은 영향을 주지 않음
   */
  clone(): QueryParams {
    return new QueryParams(this.items);
  }
}

/**
 * 플레이스홀더를 받아 SQL 조건식을 만드는 함수
 */
export type PredicateRenderer = (placeholder: string) => string;

/**
 * WHERE 절 빌더 (AND 결합)
 */
export class WhereClause {
  private readonly predicates: string[] = [];

  constructor(readonly params: QueryParams = new QueryParams()) {}

  /**
   * 값 하나를 바인딩하는 조건 추가
   * render는 같은 플레이스홀더를 여러 번 사용해도 된다
   */
  and(render: PredicateRenderer, value: unknown): this {
    this.predicates.push(render(this.params.add(value)));
    return this;
  }

  get isEmpty(): boolean {
    return this.predicates.length === 0;
  }

  /**
   * 조건이 없으면 빈 문자열
   */
  toSql(): string {
    if (this.isEmpty) {
      return "";
    }
    return ` WHERE ${this.predicates.join(" AND ")}`;
  }
}

/**
 * UPDATE ... SET 절 빌더
 */
export class SetClause {
  private readonly assignments: string[] = [];

  constructor(readonly params: QueryParams = new QueryParams()) {}

  /**
   * column = $n
   */
  assign(column: string, value: unknown): this {
    this.assignments.push(`${column} = ${this.params.add(value)}`);
    return this;
  }

  /**
   * column = <SQL 식> (바인딩 없음, 예: NOW())
   */
  assignExpression(column: string, expression: string): this {
    this.assignments.push(`${column} = ${expression}`);
    return this;
  }

  get isEmpty(): boolean {
    return this.assignments.length === 0;
  }

  toSql(): string {
    if (this.isEmpty) {
      throw new Error("SET clause requires at least one assignment");
    }
    return this.assignments.join(", ");
  }
}

/**
 * LIKE/ILIKE 패턴의 와일드카드(%, _)와 이스케이프 문자(\) 이스케이프
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}
