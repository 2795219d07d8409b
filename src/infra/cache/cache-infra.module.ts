/**
 * 캐시 인프라 모듈
 * 환경 설정에 따라 링크 상태 캐시와 분산 락 어댑터를 주입합니다.
 *
 * 환경변수:
 * - CACHE_TYPE: 'redis' | 'local' (기본값: 'local')
 *
 * Redis 설정 (CACHE_TYPE=redis):
 * - REDIS_HOST: Redis 호스트 (기본값: 'localhost')
 * - REDIS_PORT: Redis 포트 (기본값: 6379)
 * - REDIS_PASSWORD: Redis 비밀번호 (선택)
 */

import { Module, Logger } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LINK_STATUS_CACHE } from '../../domain/one-link/ports/link-status-cache.port';
import { DISTRIBUTED_LOCK_PORT } from '../../domain/lock/ports/distributed-lock.port';
import { RedisLinkStatusCache } from './redis/redis-link-status.cache';
import { InMemoryLinkStatusCache } from './local/in-memory-link-status.cache';
import { RedisLockAdapter } from '../lock/redis/redis-lock.adapter';
import { InMemoryLockAdapter } from '../lock/local/in-memory-lock.adapter';

/**
 * 캐시 타입
 */
export type CacheType = 'redis' | 'local';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: LINK_STATUS_CACHE,
      useFactory: (configService: ConfigService) => {
        const logger = new Logger('CacheInfraModule');
        const cacheType = configService.get<CacheType>('CACHE_TYPE', 'local');

        logger.log(`Initializing link status cache: ${cacheType}`);

        switch (cacheType) {
          case 'redis':
            return new RedisLinkStatusCache(configService);
          case 'local':
          default:
            return new InMemoryLinkStatusCache();
        }
      },
      inject: [ConfigService],
    },
    {
      provide: DISTRIBUTED_LOCK_PORT,
      useFactory: (configService: ConfigService) => {
        const logger = new Logger('CacheInfraModule');
        const cacheType = configService.get<CacheType>('CACHE_TYPE', 'local');

        logger.log(`Initializing lock adapter: ${cacheType}`);

        switch (cacheType) {
          case 'redis':
            return new RedisLockAdapter(configService);
          case 'local':
          default:
            return new InMemoryLockAdapter();
        }
      },
      inject: [ConfigService],
    },
  ],
  exports: [LINK_STATUS_CACHE, DISTRIBUTED_LOCK_PORT],
})
export class CacheInfraModule {}
