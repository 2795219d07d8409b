/**
 * ============================================================
 * 📦 InMemoryLockAdapter 테스트
 * ============================================================
 *
 * 🎯 테스트 대상:
 *   - try-acquire (waitTimeout 0) 의미
 *   - 소유권 기반 해제
 *   - 리스 만료 후 재획득
 * ============================================================
 */
import { InMemoryLockAdapter } from './in-memory-lock.adapter';

describe('InMemoryLockAdapter', () => {
  let adapter: InMemoryLockAdapter;

  beforeEach(() => {
    adapter = new InMemoryLockAdapter();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('보유 중인 락은 waitTimeout 0에서 즉시 실패해야 한다', async () => {
    const first = await adapter.acquire('onelink:consume:t1', { ttl: 10000, waitTimeout: 0 });
    const second = await adapter.acquire('onelink:consume:t1', { ttl: 10000, waitTimeout: 0 });

    expect(first.acquired).toBe(true);
    expect(second.acquired).toBe(false);
    await expect(adapter.isLocked('onelink:consume:t1')).resolves.toBe(true);
  });

  it('해제 후에는 다시 획득할 수 있어야 한다', async () => {
    const first = await adapter.acquire('key', { waitTimeout: 0 });
    await first.release();

    await expect(adapter.isLocked('key')).resolves.toBe(false);
    const second = await adapter.acquire('key', { waitTimeout: 0 });
    expect(second.acquired).toBe(true);
  });

  it('다른 키는 서로 독립적이어야 한다', async () => {
    const a = await adapter.acquire('a', { waitTimeout: 0 });
    const b = await adapter.acquire('b', { waitTimeout: 0 });

    expect(a.acquired).toBe(true);
    expect(b.acquired).toBe(true);
  });

  it('미획득 결과의 release는 보유자의 락을 건드리지 않아야 한다', async () => {
    await adapter.acquire('key', { waitTimeout: 0 });
    const loser = await adapter.acquire('key', { waitTimeout: 0 });

    await loser.release();

    await expect(adapter.isLocked('key')).resolves.toBe(true);
  });

  it('리스가 만료되면 다른 호출자가 획득하고, 이전 보유자의 release는 no-op이어야 한다', async () => {
    const nowSpy = jest.spyOn(Date, 'now').mockReturnValue(1_000_000);
    const stale = await adapter.acquire('key', { ttl: 100, waitTimeout: 0 });

    nowSpy.mockReturnValue(1_000_200);
    const fresh = await adapter.acquire('key', { ttl: 10000, waitTimeout: 0 });
    await stale.release();

    expect(stale.acquired).toBe(true);
    expect(fresh.acquired).toBe(true);
    await expect(adapter.isLocked('key')).resolves.toBe(true);
  });

  it('waitTimeout 동안 재시도하여 해제된 락을 획득해야 한다', async () => {
    const holder = await adapter.acquire('key', { waitTimeout: 0 });
    const waiting = adapter.acquire('key', { waitTimeout: 1000, retryInterval: 5 });

    await new Promise(resolve => setTimeout(resolve, 20));
    await holder.release();

    const result = await waiting;
    expect(result.acquired).toBe(true);
  });
});
