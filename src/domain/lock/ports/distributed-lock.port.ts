/**
 * 분산 락 포트
 * 같은 토큰에 대한 "확인 후 사용" 구간을 직렬화하기 위한 락 인터페이스
 *
 * 구현체:
 * - RedisLockAdapter: Redis 기반 분산 락 (다중 인스턴스)
 * - InMemoryLockAdapter: 메모리 기반 락 (단일 프로세스)
 */

/**
 * 락 획득 결과
 */
export interface LockResult {
  /** 락 획득 성공 여부 */
  acquired: boolean;
  /**
   * 락 해제 함수
   * 소유권이 있을 때만 삭제하며, 미획득/만료된 락에 대해서는 no-op
   */
  release: () => Promise<void>;
}

/**
 * 락 옵션
 */
export interface LockOptions {
  /** 락 리스 (ms) - 이 시간이 지나면 자동 해제, 갱신 없음 */
  ttl?: number;
  /** 락 획득 대기 시간 (ms) - 0이면 즉시 실패 (try-acquire) */
  waitTimeout?: number;
  /** 재시도 간격 (ms) */
  retryInterval?: number;
}

/**
 * 분산 락 인터페이스
 */
export interface IDistributedLockPort {
  /**
   * 락 획득 시도
   * @param key - 락 키 (예: "onelink:consume:{token}")
   */
  acquire(key: string, options?: LockOptions): Promise<LockResult>;

  /**
   * 락 보유 여부 확인
   */
  isLocked(key: string): Promise<boolean>;
}

/**
 * 분산 락 포트 토큰 (의존성 주입용)
 */
export const DISTRIBUTED_LOCK_PORT = Symbol('DISTRIBUTED_LOCK_PORT');
