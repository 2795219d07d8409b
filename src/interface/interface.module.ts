import { Module } from '@nestjs/common';

import { ShareLinkController } from './controller/share-link/share-link.controller';
import { PublicSurveyController } from './controller/public-survey/public-survey.controller';
import { HealthController } from './controller/health/health.controller';

import { BusinessModule } from '../business/business.module';

/**
 * 인터페이스 레이어 통합 모듈
 * 공유 링크 발급, 공개 설문 열람/제출, 헬스 체크 컨트롤러를 통합합니다.
 */
@Module({
  imports: [BusinessModule],
  controllers: [
    ShareLinkController, // 100번 - 설문 공유 링크 발급
    PublicSurveyController, // 200번 - 링크로 설문 열람/응답 제출
    HealthController,
  ],
})
export class InterfaceModule {}
