import type { PrefillData } from '../type/link-payload.type';

export interface OneLinkProps {
  id: number;
  resourceId: number;
  token: string;
  prefillSnapshot?: PrefillData | null;
  expiresAt: Date;
  used?: boolean;
  usedAt?: Date | null;
  firstAccessedAt?: Date | null;
  createdAt?: Date;
}

/**
 * OneLink 도메인 엔티티
 *
 * 설문 응답용 일회성 링크의 영속 레코드
 * - used: false → true 단방향 전이만 허용
 * - firstAccessedAt: 최초 검증 성공 시 한 번만 기록
 * - 만료 스윕 외에는 삭제되지 않음
 */
export class OneLink {
  id: number;
  resourceId: number;
  token: string;

  /** 감사/분석용 프리필 사본 */
  prefillSnapshot: PrefillData | null;

  expiresAt: Date;

  used: boolean;
  usedAt: Date | null;

  firstAccessedAt: Date | null;

  createdAt: Date;

  constructor(props: OneLinkProps) {
    this.id = props.id;
    this.resourceId = props.resourceId;
    this.token = props.token;
    this.prefillSnapshot = props.prefillSnapshot ?? null;
    this.expiresAt = props.expiresAt;
    this.used = props.used ?? false;
    this.usedAt = props.usedAt ?? null;
    this.firstAccessedAt = props.firstAccessedAt ?? null;
    this.createdAt = props.createdAt ?? new Date();
  }

  /**
   * 만료 여부 확인
   */
  isExpired(now: Date = new Date()): boolean {
    return now.getTime() > this.expiresAt.getTime();
  }

  /**
   * 사용 가능 여부 (미사용 + 미만료)
   */
  isValid(now: Date = new Date()): boolean {
    return !this.used && !this.isExpired(now);
  }

  /**
   * 만료까지 남은 시간 (초, 내림)
   */
  remainingSeconds(now: Date = new Date()): number {
    return Math.max(0, Math.floor((this.expiresAt.getTime() - now.getTime()) / 1000));
  }

  /**
   * 사용 처리
   * @throws 이미 사용된 링크
   */
  markUsed(now: Date = new Date()): void {
    if (this.used) {
      throw new Error('One-time link already used');
    }
    this.used = true;
    this.usedAt = now;
  }

  /**
   * 최초 접근 기록 (이미 기록되어 있으면 무시)
   * @returns 이번 호출로 기록되었는지 여부
   */
  markAccessed(now: Date = new Date()): boolean {
    if (this.firstAccessedAt) return false;
    this.firstAccessedAt = now;
    return true;
  }
}
