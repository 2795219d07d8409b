import { BusinessException, ErrorCodeDefinition, ErrorCodes } from '../../common/exceptions';
import {
  LinkError,
  LinkErrorKind,
  LinkResult,
  isRetryableLinkError,
} from '../../domain/one-link/type/link-result.type';

const ERROR_DEFINITIONS: Record<LinkErrorKind, ErrorCodeDefinition> = {
  [LinkErrorKind.INVALID_TOKEN]: ErrorCodes.ONE_LINK_INVALID_TOKEN,
  [LinkErrorKind.TOKEN_EXPIRED]: ErrorCodes.ONE_LINK_TOKEN_EXPIRED,
  [LinkErrorKind.LINK_ALREADY_USED]: ErrorCodes.ONE_LINK_ALREADY_USED,
  [LinkErrorKind.CONCURRENT_SUBMISSION]: ErrorCodes.ONE_LINK_CONCURRENT_SUBMISSION,
  [LinkErrorKind.INVALID_RESOURCE_ID]: ErrorCodes.ONE_LINK_INVALID_RESOURCE_ID,
  [LinkErrorKind.INVALID_PREFILL_KEY]: ErrorCodes.ONE_LINK_INVALID_PREFILL_KEY,
  [LinkErrorKind.EXPIRY_OUT_OF_RANGE]: ErrorCodes.ONE_LINK_EXPIRY_OUT_OF_RANGE,
  [LinkErrorKind.ENCODING_ERROR]: ErrorCodes.ONE_LINK_ENCODING_FAILED,
};

/** 다른 요청의 락 구간이 끝나기를 기다리는 시간 */
const RETRY_AFTER_SECONDS = 1;

/**
 * LinkError → BusinessException
 * 상세 사유는 context로만 전달되어 로그에 남고 응답에는 기본 메시지가 나간다.
 * 재시도 가능한 오류는 retryAfterSeconds를 실어 Retry-After 헤더로 내보낸다.
 */
export function toBusinessException(error: LinkError): BusinessException {
  const context: Record<string, unknown> = {
    ...error.context,
    kind: error.kind,
    reason: error.message,
  };
  if (isRetryableLinkError(error)) {
    context.retryAfterSeconds = RETRY_AFTER_SECONDS;
  }
  return BusinessException.of(ERROR_DEFINITIONS[error.kind], context);
}

/**
 * 성공 값을 꺼내거나 BusinessException을 throw
 */
export function unwrapLinkResult<T>(result: LinkResult<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw toBusinessException(result.error);
}
