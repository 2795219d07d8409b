import { Module } from '@nestjs/common';
import { OneLinkInfraModule } from '../../infra/database/one-link-infra.module';
import { OneLinkBusinessModule } from '../one-link/one-link.module';
import { SurveyResponseSubmitService } from './survey-response-submit.service';

/**
 * SurveyResponse Business 모듈
 */
@Module({
  imports: [OneLinkInfraModule, OneLinkBusinessModule],
  providers: [SurveyResponseSubmitService],
  exports: [SurveyResponseSubmitService],
})
export class SurveyResponseBusinessModule {}
