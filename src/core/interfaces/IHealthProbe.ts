/**
 * Health check용 DB 연결 확인 인터페이스
 */
export interface IHealthProbe {
  /**
   * 연결 확인
   * 실패 시 reject
   */
  ping(): Promise<void>;
}
