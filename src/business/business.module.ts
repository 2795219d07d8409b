import { Module } from '@nestjs/common';
import { OneLinkBusinessModule } from './one-link/one-link.module';
import { OneLinkSchedulerModule } from './one-link/scheduler/one-link-scheduler.module';
import { SurveyResponseBusinessModule } from './survey-response/survey-response.module';

/**
 * 비즈니스 레이어 통합 모듈
 * 일회용 링크, 설문 응답 비즈니스 모듈을 통합합니다.
 *
 * APP_MODE 환경변수:
 * - 'all' (기본): OneLinkSchedulerModule 포함
 * - 'api': OneLinkSchedulerModule 제외 (만료 링크 정리 Cron 비활성)
 */
const appMode = process.env.APP_MODE || 'all';

/** APP_MODE=api가 아닐 때만 스케줄러 모듈 로드 */
const schedulerModules = appMode !== 'api' ? [OneLinkSchedulerModule] : [];

@Module({
  imports: [OneLinkBusinessModule, SurveyResponseBusinessModule, ...schedulerModules],
  exports: [OneLinkBusinessModule, SurveyResponseBusinessModule],
})
export class BusinessModule {}
