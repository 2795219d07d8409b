/**
 * ============================================================
 * 📦 OneLinkLifecycleService 테스트
 * ============================================================
 *
 * 🎯 테스트 대상:
 *   - issueLink / previewLink / consumeLink
 *
 * 📋 비즈니스 맥락:
 *   - 설문 응답 링크는 한 번만 제출될 수 있다
 *   - 중복 제출(더블 클릭, 재시도)은 CONCURRENT_SUBMISSION 또는 LINK_ALREADY_USED로 거절
 *
 * ⚠️ 중요 고려사항:
 *   - 실제 코덱 + 인메모리 저장소/캐시/락 사용 (외부 의존성 없음)
 *   - 캐시는 거절 단축용이며 소비 허가 근거가 아님
 * ============================================================
 */
import { Test, TestingModule } from '@nestjs/testing';
import { OneLinkLifecycleService } from './one-link-lifecycle.service';
import { ONE_LINK_OPTIONS, type OneLinkOptions } from './one-link.options';
import { LinkTokenCodec, LinkTokenError } from '../../domain/one-link/service/link-token-codec';
import { OneLink } from '../../domain/one-link/entities/one-link.entity';
import { LinkErrorKind } from '../../domain/one-link/type/link-result.type';
import { ONE_LINK_REPOSITORY } from '../../domain/one-link/repositories/one-link.repository.interface';
import { LINK_STATUS_CACHE } from '../../domain/one-link/ports/link-status-cache.port';
import {
  PREFILL_FIELD_VALIDATOR,
  type IPrefillFieldValidator,
} from '../../domain/one-link/ports/prefill-field-validator.port';
import { DISTRIBUTED_LOCK_PORT } from '../../domain/lock/ports/distributed-lock.port';
import { InMemoryLinkStatusCache } from '../../infra/cache/local/in-memory-link-status.cache';
import { InMemoryLockAdapter } from '../../infra/lock/local/in-memory-lock.adapter';
import { InMemoryOneLinkRepository } from '../../test/fakes/in-memory-one-link.repository';
import { createTestEncryptionKey } from '../../test/fakes/test-encryption-key';

describe('OneLinkLifecycleService', () => {
  let service: OneLinkLifecycleService;
  let codec: LinkTokenCodec;
  let repository: InMemoryOneLinkRepository;
  let cache: InMemoryLinkStatusCache;
  let lock: InMemoryLockAdapter;
  let prefillValidator: jest.Mocked<IPrefillFieldValidator>;

  const options: OneLinkOptions = {
    baseUrl: 'https://survey.test',
    defaultExpirySeconds: 3600,
    maxExpirySeconds: 86400,
    lockTtlMs: 10000,
  };

  const nowSeconds = (): number => Math.floor(Date.now() / 1000);

  /**
   * 저장소를 거치지 않고 토큰과 레코드를 직접 만든다 (만료 시각 지정용)
   */
  const seedLink = (
    id: number,
    expiresAtEpochSeconds: number,
    recordExpiresAt: Date = new Date(expiresAtEpochSeconds * 1000),
  ): string => {
    const token = codec.encode({ resourceId: 42, expiresAtEpochSeconds, nonce: `nonce-${id}` });
    repository.seed(
      new OneLink({ id, resourceId: 42, token, expiresAt: recordExpiresAt }),
    );
    return token;
  };

  beforeEach(async () => {
    codec = new LinkTokenCodec(createTestEncryptionKey());
    repository = new InMemoryOneLinkRepository();
    cache = new InMemoryLinkStatusCache();
    lock = new InMemoryLockAdapter();
    prefillValidator = {
      findInvalidKeys: jest.fn().mockResolvedValue([]),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        OneLinkLifecycleService,
        { provide: LinkTokenCodec, useValue: codec },
        { provide: ONE_LINK_REPOSITORY, useValue: repository },
        { provide: LINK_STATUS_CACHE, useValue: cache },
        { provide: DISTRIBUTED_LOCK_PORT, useValue: lock },
        { provide: PREFILL_FIELD_VALIDATOR, useValue: prefillValidator },
        { provide: ONE_LINK_OPTIONS, useValue: options },
      ],
    }).compile();

    service = module.get<OneLinkLifecycleService>(OneLinkLifecycleService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  // ═══════════════════════════════════════════════════════
  // issueLink
  // ═══════════════════════════════════════════════════════
  describe('issueLink', () => {
    it('기본 유효 기간으로 발급하고 토큰에 설문 ID와 프리필을 봉인해야 한다', async () => {
      // 📥 GIVEN
      const before = nowSeconds();

      // 🎬 WHEN
      const result = await service.issueLink(42, { name: 'Alice' });
      const after = nowSeconds();

      // ✅ THEN
      if (!result.ok) throw new Error(`unexpected failure: ${result.error.kind}`);
      const { token, url, expiresAt } = result.value;

      const payload = codec.decode(token);
      expect(payload.resourceId).toBe(42);
      expect(payload.prefill).toEqual({ name: 'Alice' });
      expect(payload.expiresAtEpochSeconds).toBeGreaterThanOrEqual(before + 3600);
      expect(payload.expiresAtEpochSeconds).toBeLessThanOrEqual(after + 3600);
      expect(expiresAt.getTime()).toBe(payload.expiresAtEpochSeconds * 1000);
      expect(url).toBe(`https://survey.test/surveys/42?token=${token}`);

      const record = await repository.findByToken(token);
      expect(record?.resourceId).toBe(42);
      expect(record?.used).toBe(false);
      expect(record?.prefillSnapshot).toEqual({ name: 'Alice' });
      expect(record?.expiresAt.getTime()).toBe(expiresAt.getTime());
      expect(prefillValidator.findInvalidKeys).toHaveBeenCalledWith(42, ['name']);
    });

    it('같은 입력으로 두 번 발급해도 토큰이 달라야 한다', async () => {
      const expiresAt = new Date((nowSeconds() + 600) * 1000);

      const first = await service.issueLink(42, { name: 'Alice' }, expiresAt);
      const second = await service.issueLink(42, { name: 'Alice' }, expiresAt);

      if (!first.ok || !second.ok) throw new Error('unexpected failure');
      expect(first.value.token).not.toBe(second.value.token);
      expect(repository.size).toBe(2);
    });

    it('프리필이 없으면 검증기를 호출하지 않고 스냅샷은 null이어야 한다', async () => {
      const result = await service.issueLink(42);

      if (!result.ok) throw new Error('unexpected failure');
      expect(prefillValidator.findInvalidKeys).not.toHaveBeenCalled();
      expect(codec.decode(result.value.token).prefill).toBeUndefined();
      expect((await repository.findByToken(result.value.token))?.prefillSnapshot).toBeNull();
    });

    it('알 수 없는 프리필 키가 있으면 레코드를 만들지 않고 거절해야 한다', async () => {
      prefillValidator.findInvalidKeys.mockResolvedValue(['phone']);

      const result = await service.issueLink(42, { name: 'Alice', phone: '010' });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(LinkErrorKind.INVALID_PREFILL_KEY);
      expect(result.error.context).toEqual({ resourceId: 42, invalidKeys: ['phone'] });
      expect(repository.size).toBe(0);
    });

    it.each([
      ['음수', -1],
      ['0', 0],
      ['정수가 아닌 값', 4.2],
    ])('설문 ID가 %s이면 레코드를 만들지 않고 INVALID_RESOURCE_ID로 거절해야 한다', async (_label, resourceId) => {
      const result = await service.issueLink(resourceId, { name: 'Alice' });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(LinkErrorKind.INVALID_RESOURCE_ID);
      expect(result.error.context).toEqual({ resourceId });
      expect(prefillValidator.findInvalidKeys).not.toHaveBeenCalled();
      expect(repository.size).toBe(0);
    });

    it('예약된 프리필 키는 검증기 호출 전에 INVALID_PREFILL_KEY로 거절해야 한다', async () => {
      // 📥 GIVEN: JSON 본문에서 온 것처럼 __proto__가 자체 키로 존재
      const prefill = JSON.parse('{"__proto__":"x","name":"Alice"}');

      // 🎬 WHEN
      const result = await service.issueLink(42, prefill);

      // ✅ THEN
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(LinkErrorKind.INVALID_PREFILL_KEY);
      expect(result.error.context).toEqual({ resourceId: 42, invalidKeys: ['__proto__'] });
      expect(prefillValidator.findInvalidKeys).not.toHaveBeenCalled();
      expect(repository.size).toBe(0);
    });

    it('긴 프리필로 발급한 링크도 열람과 제출이 가능해야 한다', async () => {
      const prefill = { comment: 'a'.repeat(800) };

      const issued = await service.issueLink(42, prefill);
      if (!issued.ok) throw new Error(`unexpected failure: ${issued.error.kind}`);
      const preview = await service.previewLink(issued.value.token);
      const consumed = await service.consumeLink(issued.value.token, async () => 'stored');

      expect(issued.value.token.length).toBeGreaterThan(1024);
      expect(preview.ok && preview.value.prefill).toEqual(prefill);
      expect(consumed).toEqual({ ok: true, value: 'stored' });
    });

    it('명시한 만료 시각은 초 단위로 내림되어야 한다', async () => {
      const target = (nowSeconds() + 120) * 1000 + 750;

      const result = await service.issueLink(42, undefined, new Date(target));

      if (!result.ok) throw new Error('unexpected failure');
      expect(result.value.expiresAt.getTime()).toBe(target - 750);
    });

    it.each([
      ['과거 시각', -10],
      ['최대 유효 기간 초과', 86400 + 60],
    ])('%s이면 EXPIRY_OUT_OF_RANGE로 거절해야 한다', async (_label, offsetSeconds) => {
      const result = await service.issueLink(42, undefined, new Date((nowSeconds() + offsetSeconds) * 1000));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(LinkErrorKind.EXPIRY_OUT_OF_RANGE);
      expect(repository.size).toBe(0);
    });

    it('유효하지 않은 Date면 EXPIRY_OUT_OF_RANGE로 거절해야 한다', async () => {
      const result = await service.issueLink(42, undefined, new Date('not-a-date'));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(LinkErrorKind.EXPIRY_OUT_OF_RANGE);
    });

    it('인코딩 실패는 ENCODING_ERROR로 반환하고 레코드를 만들지 않아야 한다', async () => {
      jest.spyOn(codec, 'encode').mockImplementation(() => {
        throw new LinkTokenError(LinkErrorKind.ENCODING_ERROR, 'failed to serialize link payload');
      });

      const result = await service.issueLink(42);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(LinkErrorKind.ENCODING_ERROR);
      expect(repository.size).toBe(0);
    });
  });

  // ═══════════════════════════════════════════════════════
  // previewLink
  // ═══════════════════════════════════════════════════════
  describe('previewLink', () => {
    it('프리필을 반환하고 최초 접근 시각만 기록해야 한다', async () => {
      const issued = await service.issueLink(42, { name: 'Alice' });
      if (!issued.ok) throw new Error('unexpected failure');

      const result = await service.previewLink(issued.value.token);

      if (!result.ok) throw new Error(`unexpected failure: ${result.error.kind}`);
      expect(result.value.resourceId).toBe(42);
      expect(result.value.prefill).toEqual({ name: 'Alice' });
      expect(result.value.expiresAt.getTime()).toBe(issued.value.expiresAt.getTime());

      const record = repository.snapshot(result.value.oneLinkId);
      expect(record?.used).toBe(false);
      expect(record?.firstAccessedAt).toBeInstanceOf(Date);
    });

    it('두 번째 열람은 최초 접근 시각을 바꾸지 않아야 한다', async () => {
      const issued = await service.issueLink(42);
      if (!issued.ok) throw new Error('unexpected failure');

      const first = await service.previewLink(issued.value.token);
      if (!first.ok) throw new Error('unexpected failure');
      const firstAccessedAt = repository.snapshot(first.value.oneLinkId)?.firstAccessedAt;

      const second = await service.previewLink(issued.value.token);

      expect(second.ok).toBe(true);
      expect(repository.snapshot(first.value.oneLinkId)?.firstAccessedAt).toBe(firstAccessedAt);
    });

    it('형식이 잘못된 토큰은 INVALID_TOKEN이어야 한다', async () => {
      const result = await service.previewLink('not a token!');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(LinkErrorKind.INVALID_TOKEN);
    });

    it('복호화는 되지만 발급 이력이 없는 토큰은 INVALID_TOKEN이어야 한다', async () => {
      const token = codec.encode({ resourceId: 42, expiresAtEpochSeconds: nowSeconds() + 600, nonce: 'orphan' });

      const result = await service.previewLink(token);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(LinkErrorKind.INVALID_TOKEN);
    });

    it('접근 기록 실패는 열람을 막지 않아야 한다', async () => {
      const issued = await service.issueLink(42);
      if (!issued.ok) throw new Error('unexpected failure');
      jest.spyOn(repository, 'markAccessedIfUnset').mockRejectedValue(new Error('db down'));

      const result = await service.previewLink(issued.value.token);

      expect(result.ok).toBe(true);
    });

    it('DB에서 사용된 링크로 확인되면 캐시에 used=true를 기록해야 한다', async () => {
      const token = seedLink(5, nowSeconds() + 600);
      await repository.markUsed(5, new Date());

      const result = await service.previewLink(token);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(LinkErrorKind.LINK_ALREADY_USED);
      await expect(cache.get(token)).resolves.toEqual({ used: true });
    });
  });

  // ═══════════════════════════════════════════════════════
  // 만료 경계
  // ═══════════════════════════════════════════════════════
  describe('만료 경계', () => {
    it('expiresAt = now - 1s 링크는 열람 경로에서 TOKEN_EXPIRED여야 한다', async () => {
      const token = seedLink(1, nowSeconds() - 1);
      const findSpy = jest.spyOn(repository, 'findByToken');

      const result = await service.previewLink(token);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(LinkErrorKind.TOKEN_EXPIRED);
      // 페이로드 만료는 저장소 조회 전에 판정
      expect(findSpy).not.toHaveBeenCalled();
    });

    it('expiresAt = now - 1s 링크는 제출 경로에서 TOKEN_EXPIRED여야 한다', async () => {
      const token = seedLink(1, nowSeconds() - 1);
      const action = jest.fn();

      const result = await service.consumeLink(token, action);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(LinkErrorKind.TOKEN_EXPIRED);
      expect(action).not.toHaveBeenCalled();
    });

    it('레코드만 만료된 경우에도 TOKEN_EXPIRED로 거절하고 락을 해제해야 한다', async () => {
      const token = seedLink(2, nowSeconds() + 600, new Date(Date.now() - 1000));
      const action = jest.fn();

      const result = await service.consumeLink(token, action);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(LinkErrorKind.TOKEN_EXPIRED);
      expect(action).not.toHaveBeenCalled();
      await expect(lock.isLocked(`onelink:consume:${token}`)).resolves.toBe(false);
    });
  });

  // ═══════════════════════════════════════════════════════
  // consumeLink
  // ═══════════════════════════════════════════════════════
  describe('consumeLink', () => {
    it('설문 42 / Alice: 한 번 제출되고 두 번째 제출은 LINK_ALREADY_USED여야 한다', async () => {
      // 📥 GIVEN: 기본 유효 기간(1시간)으로 발급
      const issued = await service.issueLink(42, { name: 'Alice' });
      if (!issued.ok) throw new Error('unexpected failure');
      const token = issued.value.token;
      const action = jest.fn(async (link: OneLink) => ({ submittedFor: link.resourceId }));

      // 🎬 WHEN
      const first = await service.consumeLink(token, action);
      const second = await service.consumeLink(token, action);

      // ✅ THEN
      expect(first).toEqual({ ok: true, value: { submittedFor: 42 } });
      expect(action).toHaveBeenCalledTimes(1);

      const record = await repository.findByToken(token);
      expect(record?.used).toBe(true);
      expect(record?.usedAt).toBeInstanceOf(Date);

      expect(second.ok).toBe(false);
      if (second.ok) return;
      expect(second.error.kind).toBe(LinkErrorKind.LINK_ALREADY_USED);
      await expect(lock.isLocked(`onelink:consume:${token}`)).resolves.toBe(false);
    });

    it('K개의 동시 제출 중 정확히 하나만 성공해야 한다', async () => {
      const issued = await service.issueLink(42);
      if (!issued.ok) throw new Error('unexpected failure');
      const token = issued.value.token;
      const action = jest.fn(async () => {
        await new Promise((resolve) => setImmediate(resolve));
        return 'stored';
      });

      const results = await Promise.all(
        Array.from({ length: 5 }, () => service.consumeLink(token, action)),
      );

      const succeeded = results.filter((r) => r.ok);
      const rejectedKinds = results.flatMap((r) => (r.ok ? [] : [r.error.kind]));
      expect(succeeded).toHaveLength(1);
      expect(action).toHaveBeenCalledTimes(1);
      expect(rejectedKinds).toHaveLength(4);
      for (const kind of rejectedKinds) {
        expect([LinkErrorKind.CONCURRENT_SUBMISSION, LinkErrorKind.LINK_ALREADY_USED]).toContain(kind);
      }
      expect((await repository.findByToken(token))?.used).toBe(true);
    });

    it('락이 점유 중이면 CONCURRENT_SUBMISSION(재시도 가능)을 반환해야 한다', async () => {
      const issued = await service.issueLink(42);
      if (!issued.ok) throw new Error('unexpected failure');
      const token = issued.value.token;
      await lock.acquire(`onelink:consume:${token}`, { waitTimeout: 0 });
      const action = jest.fn();

      const result = await service.consumeLink(token, action);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(LinkErrorKind.CONCURRENT_SUBMISSION);
      expect(action).not.toHaveBeenCalled();
    });

    it('작업이 실패하면 에러를 전파하고 링크를 미사용으로 남겨야 한다', async () => {
      const issued = await service.issueLink(42);
      if (!issued.ok) throw new Error('unexpected failure');
      const token = issued.value.token;

      await expect(
        service.consumeLink(token, async () => {
          throw new Error('insert failed');
        }),
      ).rejects.toThrow('insert failed');

      expect((await repository.findByToken(token))?.used).toBe(false);
      await expect(lock.isLocked(`onelink:consume:${token}`)).resolves.toBe(false);

      const retry = await service.consumeLink(token, async () => 'ok');
      expect(retry).toEqual({ ok: true, value: 'ok' });
    });

    it('캐시 조회/기록 실패는 소비 결과에 영향을 주지 않아야 한다', async () => {
      const issued = await service.issueLink(42);
      if (!issued.ok) throw new Error('unexpected failure');
      jest.spyOn(cache, 'get').mockRejectedValue(new Error('redis down'));
      jest.spyOn(cache, 'set').mockRejectedValue(new Error('redis down'));

      const result = await service.consumeLink(issued.value.token, async () => 'ok');

      expect(result).toEqual({ ok: true, value: 'ok' });
      expect((await repository.findByToken(issued.value.token))?.used).toBe(true);
    });

    it('캐시의 used=false는 DB 확인을 대신하지 않아야 한다', async () => {
      const token = seedLink(9, nowSeconds() + 600);
      await repository.markUsed(9, new Date());
      await cache.set(token, false, 600);
      const action = jest.fn();

      const result = await service.consumeLink(token, action);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe(LinkErrorKind.LINK_ALREADY_USED);
      expect(action).not.toHaveBeenCalled();
    });

    it('이미 취소된 요청은 락을 잡지 않고 중단해야 한다', async () => {
      const issued = await service.issueLink(42);
      if (!issued.ok) throw new Error('unexpected failure');
      const controller = new AbortController();
      controller.abort(new Error('client disconnected'));
      const acquireSpy = jest.spyOn(lock, 'acquire');

      await expect(
        service.consumeLink(issued.value.token, async () => 'ok', { signal: controller.signal }),
      ).rejects.toThrow('client disconnected');
      expect(acquireSpy).not.toHaveBeenCalled();
    });

    it('락 구간에서 취소되면 작업을 실행하지 않고 락을 해제해야 한다', async () => {
      const issued = await service.issueLink(42);
      if (!issued.ok) throw new Error('unexpected failure');
      const token = issued.value.token;
      const controller = new AbortController();
      jest.spyOn(repository, 'markAccessedIfUnset').mockImplementation(async () => {
        controller.abort(new Error('client disconnected'));
      });
      const action = jest.fn();

      await expect(
        service.consumeLink(token, action, { signal: controller.signal }),
      ).rejects.toThrow('client disconnected');

      expect(action).not.toHaveBeenCalled();
      expect((await repository.findByToken(token))?.used).toBe(false);
      await expect(lock.isLocked(`onelink:consume:${token}`)).resolves.toBe(false);
    });
  });

  // ═══════════════════════════════════════════════════════
  // 캐시 일관성
  // ═══════════════════════════════════════════════════════
  describe('캐시 일관성', () => {
    it('소비 후에는 저장소 장애와 무관하게 캐시만으로 거절해야 한다', async () => {
      // 📥 GIVEN: 소비 완료된 링크
      const issued = await service.issueLink(42);
      if (!issued.ok) throw new Error('unexpected failure');
      const token = issued.value.token;
      await service.consumeLink(token, async () => 'ok');

      const findSpy = jest
        .spyOn(repository, 'findByToken')
        .mockRejectedValue(new Error('store unavailable'));
      const acquireSpy = jest.spyOn(lock, 'acquire');

      // 🎬 WHEN
      const preview = await service.previewLink(token);
      const consume = await service.consumeLink(token, async () => 'again');

      // ✅ THEN
      expect(preview.ok).toBe(false);
      expect(consume.ok).toBe(false);
      if (preview.ok || consume.ok) return;
      expect(preview.error.kind).toBe(LinkErrorKind.LINK_ALREADY_USED);
      expect(consume.error.kind).toBe(LinkErrorKind.LINK_ALREADY_USED);
      expect(findSpy).not.toHaveBeenCalled();
      expect(acquireSpy).not.toHaveBeenCalled();
    });

    it('캐시 TTL은 토큰 잔여 수명을 넘지 않아야 한다', async () => {
      const token = seedLink(3, nowSeconds() + 120);
      const setSpy = jest.spyOn(cache, 'set');

      await service.consumeLink(token, async () => 'ok');

      expect(setSpy).toHaveBeenCalledTimes(1);
      const [cachedToken, used, ttlSeconds] = setSpy.mock.calls[0];
      expect(cachedToken).toBe(token);
      expect(used).toBe(true);
      expect(ttlSeconds).toBeGreaterThanOrEqual(118);
      expect(ttlSeconds).toBeLessThanOrEqual(120);
    });
  });
});
