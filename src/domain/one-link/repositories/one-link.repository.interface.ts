import { OneLink } from '../entities/one-link.entity';
import type { PrefillData } from '../type/link-payload.type';

/**
 * OneLink 생성 입력
 */
export interface CreateOneLinkInput {
  resourceId: number;
  token: string;
  prefillSnapshot: PrefillData | null;
  expiresAt: Date;
}

/**
 * OneLink Repository 인터페이스
 *
 * 링크 사용 상태의 원본(source of truth).
 * 모든 연산은 단일 레코드 단위로 원자적이어야 합니다.
 */
export interface IOneLinkRepository {
  /**
   * 새 링크 저장 (used=false)
   * @returns 저장된 링크 (id 할당됨)
   */
  create(input: CreateOneLinkInput): Promise<OneLink>;

  /**
   * 토큰으로 조회
   */
  findByToken(token: string): Promise<OneLink | null>;

  /**
   * 사용 처리 (used=true, usedAt=now)
   * @returns 레코드가 존재하면 true
   */
  markUsed(id: number, usedAt: Date): Promise<boolean>;

  /**
   * 최초 접근 시각 기록 (이미 기록된 경우 no-op)
   */
  markAccessedIfUnset(id: number, accessedAt: Date): Promise<void>;

  /**
   * 만료된 링크 일괄 삭제
   * @returns 삭제된 수
   */
  deleteExpired(now: Date): Promise<number>;
}

export const ONE_LINK_REPOSITORY = Symbol('ONE_LINK_REPOSITORY');
