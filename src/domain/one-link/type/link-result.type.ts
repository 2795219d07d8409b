/**
 * OneLink 오류 종류
 *
 * - INVALID_TOKEN: 복호화/인증 실패 또는 발급 이력 없음 (영구)
 * - TOKEN_EXPIRED: 만료 (영구)
 * - LINK_ALREADY_USED: 이미 제출된 링크 (영구)
 * - CONCURRENT_SUBMISSION: 다른 요청이 제출 처리 중 (일시적, 재시도 가능)
 * - INVALID_RESOURCE_ID / INVALID_PREFILL_KEY / EXPIRY_OUT_OF_RANGE: 발급 입력 오류
 * - ENCODING_ERROR: 토큰 직렬화 실패 (내부 오류)
 */
export enum LinkErrorKind {
  INVALID_TOKEN = 'INVALID_TOKEN',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  LINK_ALREADY_USED = 'LINK_ALREADY_USED',
  CONCURRENT_SUBMISSION = 'CONCURRENT_SUBMISSION',
  INVALID_RESOURCE_ID = 'INVALID_RESOURCE_ID',
  INVALID_PREFILL_KEY = 'INVALID_PREFILL_KEY',
  EXPIRY_OUT_OF_RANGE = 'EXPIRY_OUT_OF_RANGE',
  ENCODING_ERROR = 'ENCODING_ERROR',
}

export interface LinkError {
  kind: LinkErrorKind;
  message: string;
  /** 디버깅용 컨텍스트 (로그 전용) */
  context?: Record<string, unknown>;
}

export type LinkResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: LinkError };

export function linkOk<T>(value: T): LinkResult<T> {
  return { ok: true, value };
}

export function linkFail<T = never>(
  kind: LinkErrorKind,
  message: string,
  context?: Record<string, unknown>,
): LinkResult<T> {
  return { ok: false, error: { kind, message, context } };
}

/**
 * 재시도로 해결될 수 있는 오류인지 여부
 */
export function isRetryableLinkError(error: LinkError): boolean {
  return error.kind === LinkErrorKind.CONCURRENT_SUBMISSION;
}
