import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { LinkTokenCodec, LinkTokenError } from '../../domain/one-link/service/link-token-codec';
import { OneLink } from '../../domain/one-link/entities/one-link.entity';
import {
  findUnsupportedPrefillKeys,
  type LinkPayload,
  type PrefillData,
} from '../../domain/one-link/type/link-payload.type';
import {
  LinkErrorKind,
  LinkResult,
  linkFail,
  linkOk,
} from '../../domain/one-link/type/link-result.type';
import {
  ONE_LINK_REPOSITORY,
  type IOneLinkRepository,
} from '../../domain/one-link/repositories/one-link.repository.interface';
import {
  LINK_STATUS_CACHE,
  type ILinkStatusCache,
} from '../../domain/one-link/ports/link-status-cache.port';
import {
  PREFILL_FIELD_VALIDATOR,
  type IPrefillFieldValidator,
} from '../../domain/one-link/ports/prefill-field-validator.port';
import {
  DISTRIBUTED_LOCK_PORT,
  type IDistributedLockPort,
  type LockResult,
} from '../../domain/lock/ports/distributed-lock.port';
import { tokenFingerprint } from '../../common/utils/token-fingerprint.util';
import { ONE_LINK_OPTIONS, type OneLinkOptions } from './one-link.options';

/**
 * 발급 결과
 */
export interface IssuedLink {
  token: string;
  url: string;
  expiresAt: Date;
}

/**
 * 미리보기 결과
 */
export interface LinkPreview {
  oneLinkId: number;
  resourceId: number;
  prefill: PrefillData | null;
  expiresAt: Date;
}

export interface ConsumeLinkOptions {
  /** 요청 취소 신호. 단계 사이마다 확인하며, 취소되어도 락은 해제된다. */
  signal?: AbortSignal;
}

/**
 * 링크가 미사용으로 확인된 뒤 락 안에서 한 번만 실행되는 작업
 */
export type LinkAction<T> = (link: OneLink) => Promise<T>;

const LOCK_KEY_PREFIX = 'onelink:consume:';

/**
 * OneLinkLifecycleService
 *
 * 일회용 링크의 발급, 미리보기, 소비를 조율한다.
 *
 * 소비 경로 (이중 확인 잠금):
 *   decode → 페이로드 만료 → 캐시 → 락 획득(try) → DB 조회 → used 재확인
 *   → 레코드 만료 → 접근 기록 → 작업 실행 → used 커밋 → 캐시 갱신 → 락 해제
 *
 * 예상 가능한 거절은 LinkResult로 반환하고, 저장소/락 백엔드 장애만 throw 한다.
 * 캐시는 거절을 단축하는 용도일 뿐 소비를 허가하는 근거가 되지 않는다.
 */
@Injectable()
export class OneLinkLifecycleService {
  private readonly logger = new Logger(OneLinkLifecycleService.name);

  constructor(
    private readonly codec: LinkTokenCodec,
    @Inject(ONE_LINK_REPOSITORY)
    private readonly linkRepository: IOneLinkRepository,
    @Inject(LINK_STATUS_CACHE)
    private readonly statusCache: ILinkStatusCache,
    @Inject(DISTRIBUTED_LOCK_PORT)
    private readonly lockPort: IDistributedLockPort,
    @Inject(PREFILL_FIELD_VALIDATOR)
    private readonly prefillValidator: IPrefillFieldValidator,
    @Inject(ONE_LINK_OPTIONS)
    private readonly options: OneLinkOptions,
  ) {}

  // ─────────────────────────────────────────────
  // 발급
  // ─────────────────────────────────────────────

  /**
   * 링크 발급
   *
   * @param expiresAt - 미지정 시 now + defaultExpirySeconds. 초 단위로 내림된다.
   */
  async issueLink(
    resourceId: number,
    prefill?: PrefillData,
    expiresAt?: Date,
  ): Promise<LinkResult<IssuedLink>> {
    if (!Number.isInteger(resourceId) || resourceId <= 0) {
      return linkFail(
        LinkErrorKind.INVALID_RESOURCE_ID,
        `resource id must be a positive integer, got ${resourceId}`,
        { resourceId },
      );
    }

    const unsupportedKeys = prefill ? findUnsupportedPrefillKeys(prefill) : [];
    if (unsupportedKeys.length > 0) {
      return linkFail(
        LinkErrorKind.INVALID_PREFILL_KEY,
        `prefill has reserved keys or unsupported values: ${unsupportedKeys.join(', ')}`,
        { resourceId, invalidKeys: unsupportedKeys },
      );
    }

    const prefillKeys = prefill ? Object.keys(prefill) : [];
    if (prefillKeys.length > 0) {
      const invalidKeys = await this.prefillValidator.findInvalidKeys(resourceId, prefillKeys);
      if (invalidKeys.length > 0) {
        return linkFail(
          LinkErrorKind.INVALID_PREFILL_KEY,
          `unknown prefill keys: ${invalidKeys.join(', ')}`,
          { resourceId, invalidKeys },
        );
      }
    }

    const expiry = this.resolveExpiry(expiresAt);
    if (!expiry.ok) {
      return expiry;
    }
    const expiresAtEpochSeconds = expiry.value;

    const payload: LinkPayload = {
      resourceId,
      expiresAtEpochSeconds,
      nonce: uuidv4(),
    };
    if (prefill && prefillKeys.length > 0) {
      payload.prefill = prefill;
    }

    let token: string;
    try {
      token = this.codec.encode(payload);
    } catch (error) {
      if (error instanceof LinkTokenError) {
        this.logger.error(`Link encoding failed: resourceId=${resourceId}`, error.stack);
        return linkFail(LinkErrorKind.ENCODING_ERROR, error.message, { resourceId });
      }
      throw error;
    }

    const link = await this.linkRepository.create({
      resourceId,
      token,
      prefillSnapshot: payload.prefill ?? null,
      expiresAt: new Date(expiresAtEpochSeconds * 1000),
    });

    this.logger.log(
      `Link issued: oneLinkId=${link.id} resourceId=${resourceId} token=${tokenFingerprint(token)} expiresAt=${link.expiresAt.toISOString()}`,
    );

    return linkOk({
      token,
      url: `${this.options.baseUrl}/surveys/${resourceId}?token=${encodeURIComponent(token)}`,
      expiresAt: link.expiresAt,
    });
  }

  /**
   * 만료 시각 결정 (epoch seconds)
   * 명시 값은 now < expiresAt ≤ now + maxExpirySeconds 이어야 한다.
   */
  private resolveExpiry(expiresAt?: Date): LinkResult<number> {
    const nowMs = Date.now();

    if (!expiresAt) {
      return linkOk(Math.floor((nowMs + this.options.defaultExpirySeconds * 1000) / 1000));
    }

    const requestedMs = expiresAt.getTime();
    const maxMs = nowMs + this.options.maxExpirySeconds * 1000;
    const epochSeconds = Math.floor(requestedMs / 1000);

    if (Number.isNaN(requestedMs) || epochSeconds * 1000 <= nowMs || requestedMs > maxMs) {
      return linkFail(
        LinkErrorKind.EXPIRY_OUT_OF_RANGE,
        `expiry must be in the future and within ${this.options.maxExpirySeconds}s`,
        {
          requestedExpiresAt: Number.isNaN(requestedMs) ? String(expiresAt) : expiresAt.toISOString(),
          maxExpirySeconds: this.options.maxExpirySeconds,
        },
      );
    }

    return linkOk(epochSeconds);
  }

  // ─────────────────────────────────────────────
  // 미리보기 (읽기 전용, 락 없음)
  // ─────────────────────────────────────────────

  /**
   * 링크 미리보기
   * used를 변경하지 않으며, 최초 접근 시각만 기록한다.
   */
  async previewLink(token: string): Promise<LinkResult<LinkPreview>> {
    const decoded = this.decodeToken(token);
    if (!decoded.ok) {
      return decoded;
    }
    const payload = decoded.value;

    const rejected = await this.checkBeforeStore(token, payload);
    if (rejected) {
      return rejected;
    }

    const checked = await this.loadUsableLink(token, payload);
    if (!checked.ok) {
      return checked;
    }
    const link = checked.value;

    await this.markAccessed(link);

    return linkOk({
      oneLinkId: link.id,
      resourceId: link.resourceId,
      prefill: payload.prefill ?? null,
      expiresAt: link.expiresAt,
    });
  }

  // ─────────────────────────────────────────────
  // 소비 (락 구간)
  // ─────────────────────────────────────────────

  /**
   * 링크 소비
   *
   * action은 링크가 미사용임을 락 안에서 확인한 경우에만, 토큰당 최대 한 번 실행된다.
   * action이 실패하면 에러를 그대로 전파하고 링크는 미사용으로 남는다.
   */
  async consumeLink<T>(
    token: string,
    action: LinkAction<T>,
    options: ConsumeLinkOptions = {},
  ): Promise<LinkResult<T>> {
    const { signal } = options;
    signal?.throwIfAborted();

    const decoded = this.decodeToken(token);
    if (!decoded.ok) {
      return decoded;
    }
    const payload = decoded.value;

    const rejected = await this.checkBeforeStore(token, payload);
    if (rejected) {
      return rejected;
    }

    signal?.throwIfAborted();

    const lockKey = `${LOCK_KEY_PREFIX}${token}`;
    const lock = await this.lockPort.acquire(lockKey, {
      ttl: this.options.lockTtlMs,
      waitTimeout: 0,
    });
    if (!lock.acquired) {
      this.logger.warn(`Concurrent submission rejected: token=${tokenFingerprint(token)}`);
      return linkFail(
        LinkErrorKind.CONCURRENT_SUBMISSION,
        'another request is submitting with this link',
        { resourceId: payload.resourceId },
      );
    }

    try {
      signal?.throwIfAborted();

      const checked = await this.loadUsableLink(token, payload);
      if (!checked.ok) {
        return checked;
      }
      const link = checked.value;

      await this.markAccessed(link);
      signal?.throwIfAborted();

      const actionStartedAt = Date.now();
      const value = await action(link);
      const actionElapsedMs = Date.now() - actionStartedAt;
      if (actionElapsedMs > this.options.lockTtlMs) {
        // 리스가 먼저 만료되면 다른 요청이 같은 구간에 진입했을 수 있음
        this.logger.warn(
          `Link action outlasted lock lease: oneLinkId=${link.id} elapsedMs=${actionElapsedMs} leaseMs=${this.options.lockTtlMs}`,
        );
      }

      const usedAt = new Date();
      const marked = await this.linkRepository.markUsed(link.id, usedAt);
      if (!marked) {
        // 작업 도중 만료 스윕으로 삭제된 경우. 토큰은 이후 INVALID_TOKEN으로 거절된다.
        this.logger.warn(`Link record vanished before commit: oneLinkId=${link.id}`);
      }
      link.markUsed(usedAt);

      await this.cacheUsed(token, payload.expiresAtEpochSeconds);

      this.logger.log(
        `Link consumed: oneLinkId=${link.id} resourceId=${link.resourceId} token=${tokenFingerprint(token)}`,
      );
      return linkOk(value);
    } finally {
      await this.releaseLock(lock, token);
    }
  }

  // ─────────────────────────────────────────────
  // 공통 단계
  // ─────────────────────────────────────────────

  private decodeToken(token: string): LinkResult<LinkPayload> {
    try {
      return linkOk(this.codec.decode(token));
    } catch (error) {
      if (error instanceof LinkTokenError) {
        this.logger.debug(`Token rejected: token=${tokenFingerprint(token)} reason=${error.message}`);
        return linkFail(LinkErrorKind.INVALID_TOKEN, error.message);
      }
      throw error;
    }
  }

  /**
   * 페이로드 만료 + 캐시 fast-path (DB 조회 전 단계)
   * @returns 거절 결과, 통과 시 null
   */
  private async checkBeforeStore(
    token: string,
    payload: LinkPayload,
  ): Promise<LinkResult<never> | null> {
    if (Date.now() > payload.expiresAtEpochSeconds * 1000) {
      return linkFail(LinkErrorKind.TOKEN_EXPIRED, 'link has expired', {
        resourceId: payload.resourceId,
        expiredAt: new Date(payload.expiresAtEpochSeconds * 1000).toISOString(),
      });
    }

    const cached = await this.readCachedStatus(token);
    if (cached?.used) {
      return linkFail(LinkErrorKind.LINK_ALREADY_USED, 'link has already been used', {
        resourceId: payload.resourceId,
        source: 'cache',
      });
    }

    return null;
  }

  /**
   * DB 조회 + used 재확인 + 레코드 만료 재확인
   */
  private async loadUsableLink(token: string, payload: LinkPayload): Promise<LinkResult<OneLink>> {
    const link = await this.linkRepository.findByToken(token);
    if (!link) {
      return linkFail(LinkErrorKind.INVALID_TOKEN, 'link was never issued', {
        resourceId: payload.resourceId,
      });
    }

    if (link.used) {
      await this.cacheUsed(token, payload.expiresAtEpochSeconds);
      return linkFail(LinkErrorKind.LINK_ALREADY_USED, 'link has already been used', {
        oneLinkId: link.id,
        usedAt: link.usedAt?.toISOString(),
      });
    }

    if (link.isExpired()) {
      return linkFail(LinkErrorKind.TOKEN_EXPIRED, 'link has expired', {
        oneLinkId: link.id,
        expiredAt: link.expiresAt.toISOString(),
      });
    }

    return linkOk(link);
  }

  /**
   * 최초 접근 기록 (정보성, 실패해도 진행)
   */
  private async markAccessed(link: OneLink): Promise<void> {
    if (link.firstAccessedAt) {
      return;
    }
    const now = new Date();
    try {
      await this.linkRepository.markAccessedIfUnset(link.id, now);
      link.markAccessed(now);
    } catch (error) {
      this.logger.warn(
        `Failed to record first access: oneLinkId=${link.id} error=${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async readCachedStatus(token: string): Promise<{ used: boolean } | null> {
    try {
      return await this.statusCache.get(token);
    } catch (error) {
      this.logger.warn(
        `Link status cache read failed, treating as miss: token=${tokenFingerprint(token)} error=${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }

  /**
   * used=true 캐시 기록. TTL은 토큰 잔여 수명이며 1초 미만이면 기록하지 않는다.
   */
  private async cacheUsed(token: string, expiresAtEpochSeconds: number): Promise<void> {
    const ttlSeconds = Math.floor((expiresAtEpochSeconds * 1000 - Date.now()) / 1000);
    if (ttlSeconds < 1) {
      return;
    }
    try {
      await this.statusCache.set(token, true, ttlSeconds);
    } catch (error) {
      this.logger.warn(
        `Link status cache write failed: token=${tokenFingerprint(token)} error=${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async releaseLock(lock: LockResult, token: string): Promise<void> {
    try {
      await lock.release();
    } catch (error) {
      // 리스 만료로 결국 풀리므로 요청 결과를 바꾸지 않음
      this.logger.warn(
        `Lock release failed: token=${tokenFingerprint(token)} error=${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
