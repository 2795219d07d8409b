import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { OneLinkInfraModule } from '../../infra/database/one-link-infra.module';
import { CacheInfraModule } from '../../infra/cache/cache-infra.module';
import { OneLinkDomainModule } from '../../domain/one-link/one-link.module';

// Services
import { OneLinkLifecycleService } from './one-link-lifecycle.service';
import { ShareLinkService } from './share-link.service';
import { ONE_LINK_OPTIONS, createOneLinkOptions } from './one-link.options';

/**
 * OneLink Business 모듈
 *
 * 일회용 링크 발급/열람/소비 유스케이스
 * - DB: 링크 레코드 (OneLinkInfraModule)
 * - 캐시/락: CACHE_TYPE에 따라 Redis 또는 인메모리 (CacheInfraModule)
 * - 토큰 코덱: 부팅 시 키 검증 (OneLinkDomainModule)
 */
@Module({
  imports: [ConfigModule, OneLinkInfraModule, CacheInfraModule, OneLinkDomainModule],
  providers: [
    {
      provide: ONE_LINK_OPTIONS,
      useFactory: (configService: ConfigService) => createOneLinkOptions(configService),
      inject: [ConfigService],
    },
    OneLinkLifecycleService,
    ShareLinkService,
  ],
  exports: [OneLinkLifecycleService, ShareLinkService],
})
export class OneLinkBusinessModule {}
