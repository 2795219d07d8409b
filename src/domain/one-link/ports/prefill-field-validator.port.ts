/**
 * 프리필 필드 검증 포트
 *
 * 리소스(설문)에 선언된 prefill 키 목록과 비교하여
 * 알 수 없는 키만 반환한다. 모두 유효하면 빈 배열.
 */
export interface IPrefillFieldValidator {
  findInvalidKeys(resourceId: number, keys: string[]): Promise<string[]>;
}

export const PREFILL_FIELD_VALIDATOR = Symbol('PREFILL_FIELD_VALIDATOR');
