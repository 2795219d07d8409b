/**
 * OneLink 스케줄러 모듈
 *
 * APP_MODE=api 에서는 로드되지 않음 (BusinessModule 참고)
 * - OneLinkCleanupScheduler: 만료 링크 삭제 (1시간 주기)
 */
import { Module } from '@nestjs/common';
import { OneLinkInfraModule } from '../../../infra/database/one-link-infra.module';
import { OneLinkCleanupScheduler } from './one-link-cleanup.scheduler';

@Module({
  imports: [OneLinkInfraModule],
  providers: [OneLinkCleanupScheduler],
})
export class OneLinkSchedulerModule {}
