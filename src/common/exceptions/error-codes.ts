/**
 * 에러 코드 정의
 *
 * 도메인별로 숫자 코드 범위를 할당합니다:
 * - 6000~6999: OneLink (일회용 링크) 도메인
 * - 7000~7999: Survey (설문/응답) 도메인
 * - 9000~9999: System/Other
 */

/**
 * 에러 코드 정의 인터페이스
 */
export interface ErrorCodeDefinition {
  /** 숫자 에러 코드 */
  code: number;
  /** 내부 식별자 (영문 대문자) */
  internalCode: string;
  /** HTTP 상태 코드 */
  httpStatus: number;
  /** 기본 메시지 (한국어) */
  defaultMessage: string;
}

/**
 * 에러 코드 상수
 */
export const ErrorCodes = {
  // OneLink 도메인 (6000~6999)
  ONE_LINK_INVALID_TOKEN: {
    code: 6001,
    internalCode: 'ONE_LINK_INVALID_TOKEN',
    httpStatus: 400,
    defaultMessage: '유효하지 않은 링크입니다.',
  },

  ONE_LINK_TOKEN_EXPIRED: {
    code: 6002,
    internalCode: 'ONE_LINK_TOKEN_EXPIRED',
    httpStatus: 410,
    defaultMessage: '만료된 링크입니다.',
  },

  ONE_LINK_ALREADY_USED: {
    code: 6003,
    internalCode: 'ONE_LINK_ALREADY_USED',
    httpStatus: 403,
    defaultMessage: '이미 사용된 링크입니다.',
  },

  ONE_LINK_CONCURRENT_SUBMISSION: {
    code: 6004,
    internalCode: 'ONE_LINK_CONCURRENT_SUBMISSION',
    httpStatus: 409,
    defaultMessage: '동일한 링크로 처리 중인 요청이 있습니다. 잠시 후 다시 시도해주세요.',
  },

  ONE_LINK_INVALID_PREFILL_KEY: {
    code: 6005,
    internalCode: 'ONE_LINK_INVALID_PREFILL_KEY',
    httpStatus: 400,
    defaultMessage: '설문에 존재하지 않는 프리필 항목이 있습니다.',
  },

  ONE_LINK_EXPIRY_OUT_OF_RANGE: {
    code: 6006,
    internalCode: 'ONE_LINK_EXPIRY_OUT_OF_RANGE',
    httpStatus: 400,
    defaultMessage: '링크 만료 시간이 허용 범위를 벗어났습니다.',
  },

  ONE_LINK_ENCODING_FAILED: {
    code: 6007,
    internalCode: 'ONE_LINK_ENCODING_FAILED',
    httpStatus: 500,
    defaultMessage: '링크 생성에 실패했습니다.',
  },

  ONE_LINK_RESOURCE_MISMATCH: {
    code: 6008,
    internalCode: 'ONE_LINK_RESOURCE_MISMATCH',
    httpStatus: 400,
    defaultMessage: '링크가 요청한 설문과 일치하지 않습니다.',
  },

  ONE_LINK_INVALID_RESOURCE_ID: {
    code: 6009,
    internalCode: 'ONE_LINK_INVALID_RESOURCE_ID',
    httpStatus: 400,
    defaultMessage: '설문 ID는 1 이상의 정수여야 합니다.',
  },

  // Survey 도메인 (7000~7999)
  SURVEY_NOT_FOUND: {
    code: 7001,
    internalCode: 'SURVEY_NOT_FOUND',
    httpStatus: 404,
    defaultMessage: '설문을 찾을 수 없습니다.',
  },

  SURVEY_NOT_PUBLISHED: {
    code: 7002,
    internalCode: 'SURVEY_NOT_PUBLISHED',
    httpStatus: 403,
    defaultMessage: '응답을 받지 않는 설문입니다.',
  },

  SURVEY_INVALID_ANSWER: {
    code: 7003,
    internalCode: 'SURVEY_INVALID_ANSWER',
    httpStatus: 400,
    defaultMessage: '응답 값이 문항 설정과 맞지 않습니다.',
  },

  SURVEY_REQUIRED_ANSWER_MISSING: {
    code: 7004,
    internalCode: 'SURVEY_REQUIRED_ANSWER_MISSING',
    httpStatus: 400,
    defaultMessage: '필수 문항에 응답하지 않았습니다.',
  },

  // System/Other (9000~9999)
  UNKNOWN_ERROR: {
    code: 9999,
    internalCode: 'UNKNOWN_ERROR',
    httpStatus: 500,
    defaultMessage: '서버 오류가 발생했습니다.',
  },
} satisfies Record<string, ErrorCodeDefinition>;

/**
 * 숫자 코드로 에러 정의 조회
 */
export function getErrorDefinition(
  code: number,
): ErrorCodeDefinition | undefined {
  return Object.values(ErrorCodes).find((def) => def.code === code);
}
