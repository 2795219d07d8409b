/**
 * 링크 상태 캐시 포트
 *
 * 링크 사용 여부를 TTL 기반으로 빠르게 조회하기 위한 투영(projection).
 * 원본은 DB이며, 캐시는 거절(reject)을 단축하는 용도로만 사용한다.
 *
 * 구현체:
 * - RedisLinkStatusCache: Redis 기반 (다중 인스턴스)
 * - InMemoryLinkStatusCache: 메모리 기반 (단일 프로세스)
 */
export interface LinkStatus {
  used: boolean;
}

export interface ILinkStatusCache {
  /**
   * 상태 조회
   * @returns 캐시 미스 시 null
   */
  get(token: string): Promise<LinkStatus | null>;

  /**
   * 상태 저장
   * @param ttlSeconds 만료 시간 (초)
   */
  set(token: string, used: boolean, ttlSeconds: number): Promise<void>;
}

export const LINK_STATUS_CACHE = Symbol('LINK_STATUS_CACHE');
