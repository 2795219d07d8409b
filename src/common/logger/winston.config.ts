/**
 * Winston 로거 설정
 *
 * - 민감정보 마스킹: 메타데이터의 토큰, 비밀번호, 키 값을 로그에서 제거
 * - 요청 컨텍스트 주입: traceId, requestId, ipAddress 자동 부착
 * - 파일 로테이션: app / error 로그를 일별로 분리
 * - 환경별 분기: 개발(debug + 컬러 콘솔) / 프로덕션(info + JSON)
 */
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { RequestContext } from '../context/request-context';

// ─────────────────────────────────────────────
// 민감정보 마스킹 필터
// ─────────────────────────────────────────────

/**
 * 마스킹 대상 키 (대소문자 무시, 부분 일치)
 * 'token'이 accessToken, refreshToken 등도 함께 덮는다.
 */
const sensitiveKeys = [
  'password',
  'token',
  'secret',
  'authorization',
  'cookie',
  'encryptionkey',
  'prefill',
];

export const MASKED = '***MASKED***';

/**
 * 객체를 재귀적으로 순회하며 민감 키의 값을 치환한 사본을 반환한다.
 */
export function maskSensitive(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => maskSensitive(item));
  }
  if (value === null || typeof value !== 'object' || value instanceof Date) {
    return value;
  }

  const masked: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();
    masked[key] = sensitiveKeys.some((s) => lowerKey.includes(s))
      ? MASKED
      : maskSensitive(nested);
  }
  return masked;
}

// ─────────────────────────────────────────────
// 요청 컨텍스트 자동 주입 포맷
// ─────────────────────────────────────────────

const contextFormat = winston.format((info) => {
  const ctx = RequestContext.get();
  if (ctx) {
    info.traceId = ctx.traceId || 'no-trace';
    info.requestId = ctx.requestId;
    info.ipAddress = ctx.ipAddress || 'unknown';
  }
  if (info.metadata) {
    info.metadata = maskSensitive(info.metadata);
  }
  return info;
})();

// ─────────────────────────────────────────────
// 출력 포맷
// ─────────────────────────────────────────────

const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  contextFormat,
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

/**
 * 출력 예시: 15:30:00.123 info [OneLinkLifecycleService][4bf92f35...] Link consumed
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  contextFormat,
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, traceId, context }) => {
    const trace = traceId ? `[${String(traceId)}]` : '';
    const ctx = context ? `[${String(context)}]` : '';
    return `${String(timestamp)} ${level} ${ctx}${trace} ${String(message)}`;
  }),
);

// ─────────────────────────────────────────────
// Winston 설정 팩토리
// ─────────────────────────────────────────────

/**
 * WinstonModule.forRoot에 넘길 설정 생성
 *
 * @param logDir - 로그 파일 디렉토리 (기본값: 'logs')
 */
export function createWinstonConfig(logDir = 'logs'): winston.LoggerOptions {
  const isProduction = process.env.NODE_ENV === 'production';

  const transports: winston.transport[] = [
    new winston.transports.Console({
      level: isProduction ? 'info' : 'debug',
      format: isProduction ? jsonFormat : consoleFormat,
    }),

    // 전체 로그 (14일 보관)
    new DailyRotateFile({
      dirname: logDir,
      filename: 'app-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '14d',
      level: 'info',
      format: jsonFormat,
    }),

    // 에러 전용 (30일 보관)
    new DailyRotateFile({
      dirname: logDir,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      level: 'error',
      format: jsonFormat,
    }),
  ];

  return {
    transports,
    exceptionHandlers: [
      new DailyRotateFile({
        dirname: logDir,
        filename: 'exceptions-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxFiles: '7d',
        format: jsonFormat,
      }),
    ],
  };
}
