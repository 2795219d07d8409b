import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import * as crypto from 'crypto';
import { RequestContext } from '../context/request-context';

/**
 * HTTP 요청 헤더에서 IP 주소 추출
 */
export function extractIpAddress(req: Request): string {
  // 프록시/로드밸런서 경유 시 첫 번째 주소가 클라이언트
  const forwardedFor = req.headers['x-forwarded-for'];
  if (forwardedFor) {
    const first = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor.split(',')[0];
    return first.trim();
  }

  const realIp = req.headers['x-real-ip'];
  if (realIp) {
    return Array.isArray(realIp) ? realIp[0] : realIp;
  }

  return req.ip || req.socket.remoteAddress || 'unknown';
}

/**
 * 16바이트 hex Trace-ID (타임스탬프 8바이트 + 랜덤 8바이트)
 */
function generateTraceId(): string {
  const timestampBuffer = Buffer.allocUnsafe(8);
  timestampBuffer.writeBigUInt64BE(BigInt(Date.now()), 0);
  return Buffer.concat([timestampBuffer, crypto.randomBytes(8)]).toString('hex');
}

function extractTraceId(req: Request): string {
  const traceHeader = req.headers['x-trace-id'];
  if (traceHeader) {
    return Array.isArray(traceHeader) ? traceHeader[0] : traceHeader;
  }
  return generateTraceId();
}

/**
 * RequestContextMiddleware
 *
 * 모든 HTTP 요청에 대해 요청 ID, Trace-ID, IP, User-Agent를 컨텍스트에 설정
 */
@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction): void {
    const requestId = uuidv4();
    const traceId = extractTraceId(req);

    res.setHeader('X-Request-Id', requestId);
    res.setHeader('X-Trace-Id', traceId);

    RequestContext.run(
      {
        requestId,
        traceId,
        ipAddress: extractIpAddress(req),
        userAgent: req.headers['user-agent'] || 'unknown',
      },
      () => next(),
    );
  }
}
