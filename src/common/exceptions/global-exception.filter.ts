import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  Inject,
} from '@nestjs/common';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import type { LoggerService } from '@nestjs/common';
import { Request, Response } from 'express';
import { BusinessException } from './business.exception';
import { ErrorCodes } from './error-codes';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  constructor(
    @Inject(WINSTON_MODULE_NEST_PROVIDER)
    private readonly logger: LoggerService,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const requestInfo = `${request.method} ${request.path}`;

    if (exception instanceof BusinessException) {
      const httpStatus = exception.getStatus();

      // 5xx만 error 레벨, 나머지는 클라이언트 원인
      const logLine =
        `[${requestInfo}] errorCode=${exception.errorCode} internalCode=${exception.internalCode} ` +
        `context=${JSON.stringify(exception.context ?? {})}`;
      if (httpStatus >= 500) {
        this.logger.error(logLine, exception.stack, 'GlobalExceptionFilter');
      } else {
        this.logger.warn(logLine, 'GlobalExceptionFilter');
      }

      const retryAfterSeconds = exception.context?.retryAfterSeconds;
      if (typeof retryAfterSeconds === 'number') {
        response.setHeader('Retry-After', String(retryAfterSeconds));
      }

      response.status(httpStatus).json({
        statusCode: httpStatus,
        errorCode: exception.errorCode,
        internalCode: exception.internalCode,
        message: exception.message,
        timestamp: new Date().toISOString(),
      });
      return;
    }

    if (exception instanceof HttpException) {
      const httpStatus = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (isRecord(exceptionResponse) && Array.isArray(exceptionResponse.message)) {
        // ValidationPipe 에러: 필드별 실패 사유 (body는 토큰을 포함할 수 있어 기록하지 않음)
        this.logger.warn(
          `[${requestInfo}] ValidationPipe 유효성 검증 실패 [${httpStatus}]: ` +
            `${exceptionResponse.message.length}개 에러 → ${JSON.stringify(exceptionResponse.message)}`,
          'GlobalExceptionFilter',
        );
      } else {
        this.logger.warn(
          `[${requestInfo}] HttpException [${httpStatus}]: ${exception.message}`,
          'GlobalExceptionFilter',
        );
      }

      if (isRecord(exceptionResponse)) {
        response.status(httpStatus).json({
          ...exceptionResponse,
          timestamp: new Date().toISOString(),
        });
      } else {
        response.status(httpStatus).json({
          statusCode: httpStatus,
          message: exceptionResponse,
          timestamp: new Date().toISOString(),
        });
      }
      return;
    }

    const unknownError = ErrorCodes.UNKNOWN_ERROR;
    this.logger.error(
      `[${requestInfo}] 처리되지 않은 예외: errorCode=${unknownError.code}`,
      exception instanceof Error ? exception.stack : String(exception),
      'GlobalExceptionFilter',
    );

    response.status(unknownError.httpStatus).json({
      statusCode: unknownError.httpStatus,
      errorCode: unknownError.code,
      internalCode: unknownError.internalCode,
      message: unknownError.defaultMessage,
      timestamp: new Date().toISOString(),
    });
  }
}
