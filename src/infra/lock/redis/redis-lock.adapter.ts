/**
 * Redis 분산 락 어댑터
 * IDistributedLockPort의 Redis 기반 구현체
 *
 * SET NX PX 명령을 사용하여 분산 환경에서 안전한 락을 제공합니다.
 */

import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import Redis from 'ioredis';
import type {
  IDistributedLockPort,
  LockResult,
  LockOptions,
} from '../../../domain/lock/ports/distributed-lock.port';

const DEFAULT_TTL = 10000; // 10초
const DEFAULT_WAIT_TIMEOUT = 0; // try-acquire
const DEFAULT_RETRY_INTERVAL = 100; // 100ms

// 소유권 확인 후 삭제
const RELEASE_SCRIPT = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
  else
    return 0
  end
`;

@Injectable()
export class RedisLockAdapter implements IDistributedLockPort, OnModuleDestroy {
  private readonly logger = new Logger(RedisLockAdapter.name);
  private readonly redis: Redis;
  private readonly lockPrefix = 'lock:';

  constructor(private readonly configService: ConfigService) {
    this.redis = new Redis({
      host: this.configService.get<string>('REDIS_HOST', 'localhost'),
      port: Number(this.configService.get<string>('REDIS_PORT', '6379')),
      password: this.configService.get<string>('REDIS_PASSWORD'),
    });
    this.logger.log('RedisLockAdapter 초기화됨');
  }

  async onModuleDestroy(): Promise<void> {
    await this.redis.quit();
    this.logger.log('Redis 연결 종료됨');
  }

  private getLockKey(key: string): string {
    return `${this.lockPrefix}${key}`;
  }

  async acquire(key: string, options?: LockOptions): Promise<LockResult> {
    const lockKey = this.getLockKey(key);
    const lockValue = `${process.pid}-${randomUUID()}`;
    const ttl = options?.ttl ?? DEFAULT_TTL;
    const waitTimeout = options?.waitTimeout ?? DEFAULT_WAIT_TIMEOUT;
    const retryInterval = options?.retryInterval ?? DEFAULT_RETRY_INTERVAL;

    const startTime = Date.now();

    while (true) {
      const result = await this.redis.set(lockKey, lockValue, 'PX', ttl, 'NX');

      if (result === 'OK') {
        this.logger.debug(`락 획득: ${key}`);
        return {
          acquired: true,
          release: async () => {
            const deleted = await this.redis.eval(RELEASE_SCRIPT, 1, lockKey, lockValue);
            if (deleted === 1) {
              this.logger.debug(`락 해제: ${key}`);
            } else {
              this.logger.warn(`락 해제 생략 (만료 또는 소유자 아님): ${key}`);
            }
          },
        };
      }

      if (Date.now() - startTime >= waitTimeout) {
        this.logger.debug(`락 획득 실패: ${key}`);
        return {
          acquired: false,
          release: async () => { /* no-op */ },
        };
      }

      await this.sleep(retryInterval);
    }
  }

  async isLocked(key: string): Promise<boolean> {
    const result = await this.redis.exists(this.getLockKey(key));
    return result === 1;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
