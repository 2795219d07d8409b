import { HttpException } from '@nestjs/common';
import { ErrorCodeDefinition } from './error-codes';

/**
 * 비즈니스 예외 클래스
 *
 * 에러 코드 정의와 디버깅용 컨텍스트를 함께 싣는 HttpException.
 * 응답 형태는 GlobalExceptionFilter가 결정한다.
 */
export class BusinessException extends HttpException {
  readonly errorCode: number;

  readonly internalCode: string;

  /** 로그에만 기록, 응답에는 포함되지 않음 */
  readonly context?: Record<string, unknown>;

  constructor(
    errorDef: ErrorCodeDefinition,
    context?: Record<string, unknown>,
    messageOverride?: string,
  ) {
    super(
      {
        errorCode: errorDef.code,
        internalCode: errorDef.internalCode,
        message: messageOverride ?? errorDef.defaultMessage,
      },
      errorDef.httpStatus,
    );

    this.errorCode = errorDef.code;
    this.internalCode = errorDef.internalCode;
    this.context = context;
  }

  static of(
    errorDef: ErrorCodeDefinition,
    context?: Record<string, unknown>,
    messageOverride?: string,
  ): BusinessException {
    return new BusinessException(errorDef, context, messageOverride);
  }
}
