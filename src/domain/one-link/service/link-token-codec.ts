import * as crypto from 'crypto';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { LinkErrorKind } from '../type/link-result.type';
import type { LinkPayload } from '../type/link-payload.type';
import { LinkEncryptionKey } from '../value-objects/link-encryption-key.vo';
import { SealedLinkPayload } from './sealed-link-payload';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
/** 패딩 없는 base64url 문자만 허용 */
const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * 토큰 인코딩/디코딩 실패
 */
export class LinkTokenError extends Error {
  constructor(
    readonly kind: LinkErrorKind.INVALID_TOKEN | LinkErrorKind.ENCODING_ERROR,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'LinkTokenError';
  }
}

/**
 * 링크 토큰 코덱
 *
 * LinkPayload를 AES-256-GCM으로 봉인하여 URL-safe 문자열로 변환합니다.
 *
 * 토큰 레이아웃 (base64url, 패딩 없음):
 *   iv(12) | ciphertext(N) | authTag(16)
 *
 * - encode는 호출마다 새 IV를 사용하므로 같은 페이로드라도 결과가 다름
 * - decode는 인증 실패 시 어떤 평문도 반환하지 않음
 */
export class LinkTokenCodec {
  private readonly keyBytes: Buffer;

  constructor(key: LinkEncryptionKey) {
    this.keyBytes = key.bytes;
  }

  /**
   * 페이로드 → 토큰
   * decode가 거절할 페이로드는 봉인하지 않는다.
   * @throws LinkTokenError(ENCODING_ERROR) 스키마 불일치 또는 직렬화 실패 시
   */
  encode(payload: LinkPayload): string {
    const sealed = SealedLinkPayload.fromPayload(payload);
    const errors = validateSync(sealed);
    if (errors.length > 0) {
      throw new LinkTokenError(
        LinkErrorKind.ENCODING_ERROR,
        `link payload is malformed: ${errors.map((e) => e.property).join(', ')}`,
      );
    }

    let plaintext: Buffer;
    try {
      plaintext = Buffer.from(JSON.stringify(sealed), 'utf8');
    } catch (error) {
      throw new LinkTokenError(
        LinkErrorKind.ENCODING_ERROR,
        'failed to serialize link payload',
        error,
      );
    }

    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.keyBytes, iv, {
      authTagLength: AUTH_TAG_LENGTH,
    });
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    const authTag = cipher.getAuthTag();

    return Buffer.concat([iv, ciphertext, authTag]).toString('base64url');
  }

  /**
   * 토큰 → 페이로드
   * @throws LinkTokenError(INVALID_TOKEN) 형식 오류, 길이 부족, 인증 실패, 스키마 불일치
   */
  decode(token: string): LinkPayload {
    if (!token || !BASE64URL_PATTERN.test(token)) {
      throw this.invalid('token is not base64url text');
    }

    const raw = Buffer.from(token, 'base64url');
    // 하위 비트만 다른 변형 문자열은 같은 바이트로 디코딩되므로 정규형만 허용
    if (raw.toString('base64url') !== token) {
      throw this.invalid('token is not canonical base64url');
    }
    if (raw.length < IV_LENGTH + AUTH_TAG_LENGTH) {
      throw this.invalid('token is too short');
    }

    const iv = raw.subarray(0, IV_LENGTH);
    const ciphertext = raw.subarray(IV_LENGTH, raw.length - AUTH_TAG_LENGTH);
    const authTag = raw.subarray(raw.length - AUTH_TAG_LENGTH);

    let plaintext: Buffer;
    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, this.keyBytes, iv, {
        authTagLength: AUTH_TAG_LENGTH,
      });
      decipher.setAuthTag(authTag);
      plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch (error) {
      throw this.invalid('token authentication failed', error);
    }

    return this.parsePayload(plaintext);
  }

  private parsePayload(plaintext: Buffer): LinkPayload {
    let parsed: unknown;
    try {
      parsed = JSON.parse(plaintext.toString('utf8'));
    } catch (error) {
      throw this.invalid('token payload is not JSON', error);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw this.invalid('token payload is not an object');
    }

    const sealed = plainToInstance(SealedLinkPayload, parsed);
    // class-transformer는 pf를 새 객체로 복사하며 일부 키를 누락하므로 원본으로 검증
    sealed.pf = 'pf' in parsed ? parsed.pf : undefined;
    const errors = validateSync(sealed);
    if (errors.length > 0) {
      throw this.invalid(
        `token payload is malformed: ${errors.map((e) => e.property).join(', ')}`,
      );
    }

    return sealed.toPayload();
  }

  private invalid(message: string, cause?: unknown): LinkTokenError {
    return new LinkTokenError(LinkErrorKind.INVALID_TOKEN, message, cause);
  }
}
