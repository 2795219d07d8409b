import { AsyncLocalStorage } from 'async_hooks';
import { v4 as uuidv4 } from 'uuid';

/**
 * 요청 컨텍스트 데이터
 */
export interface RequestContextData {
  requestId: string;
  traceId?: string;
  ipAddress?: string;
  userAgent?: string;
}

/**
 * RequestContext
 *
 * AsyncLocalStorage를 사용하여 요청별 컨텍스트 관리
 * 로거와 응답 저장 로직이 요청 객체 없이 클라이언트 정보를 조회할 때 사용
 */
export class RequestContext {
  private static storage = new AsyncLocalStorage<RequestContextData>();

  /**
   * 새로운 컨텍스트로 실행
   */
  static run<T>(data: Partial<RequestContextData>, fn: () => T): T {
    const contextData: RequestContextData = {
      requestId: data.requestId || uuidv4(),
      traceId: data.traceId,
      ipAddress: data.ipAddress,
      userAgent: data.userAgent,
    };
    return this.storage.run(contextData, fn);
  }

  static get(): RequestContextData | undefined {
    return this.storage.getStore();
  }

  static getRequestId(): string | undefined {
    return this.get()?.requestId;
  }

  static getTraceId(): string | undefined {
    return this.get()?.traceId;
  }

  static getIpAddress(): string {
    return this.get()?.ipAddress || 'unknown';
  }

  static getUserAgent(): string {
    return this.get()?.userAgent || 'unknown';
  }
}
