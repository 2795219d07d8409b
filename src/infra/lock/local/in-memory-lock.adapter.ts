/**
 * 인메모리 락 어댑터
 * IDistributedLockPort의 메모리 기반 구현체
 *
 * 단일 프로세스 환경에서 사용됩니다.
 * 주의: 다중 프로세스/인스턴스 환경에서는 사용하지 마세요.
 */

import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type {
  IDistributedLockPort,
  LockResult,
  LockOptions,
} from '../../../domain/lock/ports/distributed-lock.port';

const DEFAULT_TTL = 10000; // 10초
const DEFAULT_WAIT_TIMEOUT = 0; // try-acquire
const DEFAULT_RETRY_INTERVAL = 100; // 100ms

interface LockEntry {
  value: string;
  expiresAt: number;
}

@Injectable()
export class InMemoryLockAdapter implements IDistributedLockPort {
  private readonly logger = new Logger(InMemoryLockAdapter.name);
  private readonly locks: Map<string, LockEntry> = new Map();

  /**
   * 만료된 락 정리 (타이머 없이 접근 시점에 판정)
   */
  private cleanupExpiredLock(key: string): void {
    const entry = this.locks.get(key);
    if (entry && Date.now() >= entry.expiresAt) {
      this.locks.delete(key);
      this.logger.debug(`Expired lock cleaned up: ${key}`);
    }
  }

  async acquire(key: string, options?: LockOptions): Promise<LockResult> {
    const lockValue = randomUUID();
    const ttl = options?.ttl ?? DEFAULT_TTL;
    const waitTimeout = options?.waitTimeout ?? DEFAULT_WAIT_TIMEOUT;
    const retryInterval = options?.retryInterval ?? DEFAULT_RETRY_INTERVAL;

    const startTime = Date.now();

    while (true) {
      this.cleanupExpiredLock(key);

      // 확인과 설정 사이에 await가 없으므로 같은 프로세스 안에서 원자적
      if (!this.locks.has(key)) {
        this.locks.set(key, { value: lockValue, expiresAt: Date.now() + ttl });
        this.logger.debug(`Lock acquired: ${key}`);

        return {
          acquired: true,
          release: async () => {
            const entry = this.locks.get(key);
            if (entry?.value === lockValue && Date.now() < entry.expiresAt) {
              this.locks.delete(key);
              this.logger.debug(`Lock released: ${key}`);
            }
          },
        };
      }

      if (Date.now() - startTime >= waitTimeout) {
        this.logger.debug(`Failed to acquire lock: ${key}`);
        return {
          acquired: false,
          release: async () => { /* no-op */ },
        };
      }

      await this.sleep(retryInterval);
    }
  }

  async isLocked(key: string): Promise<boolean> {
    this.cleanupExpiredLock(key);
    return this.locks.has(key);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
