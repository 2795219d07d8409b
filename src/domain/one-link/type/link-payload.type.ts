/**
 * 프리필 값 타입
 *
 * 스칼라 값 또는 스칼라 배열만 허용 (다중 선택 문항용)
 */
export type PrefillScalar = string | number | boolean | null;
export type PrefillValue = PrefillScalar | PrefillScalar[];

/** 프리필 키 → 값 매핑 */
export type PrefillData = Record<string, PrefillValue>;

/**
 * 토큰 내부에 암호화되어 봉인되는 페이로드
 */
export interface LinkPayload {
  /** 대상 리소스(설문) ID */
  resourceId: number;
  /** 프리필 데이터 (발급 이후 불변) */
  prefill?: PrefillData;
  /** 만료 시각 (epoch seconds) */
  expiresAtEpochSeconds: number;
  /** 발급마다 새로 생성되는 고유 값 */
  nonce: string;
}

/**
 * 프리필 값이 허용된 형태인지 확인
 */
export function isPrefillValue(value: unknown): value is PrefillValue {
  if (Array.isArray(value)) {
    return value.every(isPrefillScalar);
  }
  return isPrefillScalar(value);
}

function isPrefillScalar(value: unknown): value is PrefillScalar {
  if (value === null) return true;
  if (typeof value === 'number') return Number.isFinite(value);
  return typeof value === 'string' || typeof value === 'boolean';
}

/**
 * 객체 리터럴이나 JSON.parse 결과에서 프로토타입 조작으로 해석될 수 있는 키
 */
export const RESERVED_PREFILL_KEYS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * 프리필 매핑 전체 검증 (객체 + 예약되지 않은 키 + 모든 값이 허용 형태)
 */
export function isPrefillData(value: unknown): value is PrefillData {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.entries(value).every(
    ([key, entry]) => !RESERVED_PREFILL_KEYS.has(key) && isPrefillValue(entry),
  );
}

/**
 * 예약 키이거나 값이 허용 형태가 아닌 키 목록 (입력 순서 유지)
 */
export function findUnsupportedPrefillKeys(prefill: Record<string, unknown>): string[] {
  return Object.entries(prefill)
    .filter(([key, value]) => RESERVED_PREFILL_KEYS.has(key) || !isPrefillValue(value))
    .map(([key]) => key);
}
