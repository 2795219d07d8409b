import { ConfigService } from '@nestjs/config';

/**
 * OneLink 발급/소비 설정
 */
export interface OneLinkOptions {
  /** 링크 URL의 기준 주소 (끝 슬래시 제거됨) */
  baseUrl: string;
  /** 만료 미지정 시 기본 유효 기간 (초) */
  defaultExpirySeconds: number;
  /** 발급 시점 기준 최대 유효 기간 (초) */
  maxExpirySeconds: number;
  /** 소비 구간 락 리스 (ms), 갱신 없음 */
  lockTtlMs: number;
}

export const ONE_LINK_OPTIONS = Symbol('ONE_LINK_OPTIONS');

function readPositiveInt(configService: ConfigService, key: string, defaultValue: number): number {
  const raw = configService.get<string>(key);
  if (raw === undefined || raw === '') {
    return defaultValue;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * 환경변수에서 OneLinkOptions 생성
 *
 * - ONE_LINK_BASE_URL (기본값: 'http://localhost:3000')
 * - ONE_LINK_DEFAULT_EXPIRY_SECONDS (기본값: 3600)
 * - ONE_LINK_MAX_EXPIRY_SECONDS (기본값: 2592000, 30일)
 * - ONE_LINK_LOCK_TTL_MS (기본값: 10000)
 */
export function createOneLinkOptions(configService: ConfigService): OneLinkOptions {
  const baseUrl = configService
    .get<string>('ONE_LINK_BASE_URL', 'http://localhost:3000')
    .replace(/\/+$/, '');
  const defaultExpirySeconds = readPositiveInt(configService, 'ONE_LINK_DEFAULT_EXPIRY_SECONDS', 3600);
  const maxExpirySeconds = readPositiveInt(configService, 'ONE_LINK_MAX_EXPIRY_SECONDS', 2592000);
  const lockTtlMs = readPositiveInt(configService, 'ONE_LINK_LOCK_TTL_MS', 10000);

  if (defaultExpirySeconds > maxExpirySeconds) {
    throw new Error(
      `ONE_LINK_DEFAULT_EXPIRY_SECONDS (${defaultExpirySeconds}) exceeds ONE_LINK_MAX_EXPIRY_SECONDS (${maxExpirySeconds})`,
    );
  }

  return { baseUrl, defaultExpirySeconds, maxExpirySeconds, lockTtlMs };
}
