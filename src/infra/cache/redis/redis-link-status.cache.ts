/**
 * Redis 링크 상태 캐시 어댑터
 * ILinkStatusCache의 Redis 기반 구현체
 *
 * 키: onelink:status:{token}, 값: 'used' | 'unused', EX로 만료
 */

import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import type {
  ILinkStatusCache,
  LinkStatus,
} from '../../../domain/one-link/ports/link-status-cache.port';

const USED = 'used';
const UNUSED = 'unused';

@Injectable()
export class RedisLinkStatusCache implements ILinkStatusCache, OnModuleDestroy {
  private readonly logger = new Logger(RedisLinkStatusCache.name);
  private readonly redis: Redis;
  private readonly keyPrefix = 'onelink:status:';

  constructor(private readonly configService: ConfigService) {
    this.redis = new Redis({
      host: this.configService.get<string>('REDIS_HOST', 'localhost'),
      port: Number(this.configService.get<string>('REDIS_PORT', '6379')),
      password: this.configService.get<string>('REDIS_PASSWORD'),
    });
    this.logger.log('RedisLinkStatusCache 초기화됨');
  }

  async onModuleDestroy(): Promise<void> {
    await this.redis.quit();
    this.logger.log('Redis 연결 종료됨');
  }

  private getKey(token: string): string {
    return `${this.keyPrefix}${token}`;
  }

  async get(token: string): Promise<LinkStatus | null> {
    const value = await this.redis.get(this.getKey(token));
    if (value === USED) return { used: true };
    if (value === UNUSED) return { used: false };
    return null;
  }

  async set(token: string, used: boolean, ttlSeconds: number): Promise<void> {
    await this.redis.set(this.getKey(token), used ? USED : UNUSED, 'EX', ttlSeconds);
  }
}
