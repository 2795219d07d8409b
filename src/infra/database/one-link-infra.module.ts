import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

// ORM Entities
import { OneLinkOrmEntity } from './entities/one-link.orm-entity';
import { SurveyResponseOrmEntity } from './entities/survey-response.orm-entity';
import { SurveyQuestionOrmEntity } from './entities/survey-question.orm-entity';
import { SurveyOrmEntity } from './entities/survey.orm-entity';

// Repositories
import { OneLinkRepository } from './repositories/one-link.repository';
import { SurveyResponseRepository } from './repositories/survey-response.repository';
import { SurveyQuestionPrefillValidator } from './repositories/survey-question-prefill.validator';
import { SurveyRepository } from './repositories/survey.repository';

// Tokens
import { ONE_LINK_REPOSITORY } from '../../domain/one-link/repositories/one-link.repository.interface';
import { PREFILL_FIELD_VALIDATOR } from '../../domain/one-link/ports/prefill-field-validator.port';
import { SURVEY_RESPONSE_REPOSITORY } from '../../domain/survey-response/repositories/survey-response.repository.interface';
import { SURVEY_REPOSITORY } from '../../domain/survey/repositories/survey.repository.interface';

/**
 * OneLink Infrastructure 모듈
 *
 * 일회용 링크 시스템의 인프라 레이어
 * - TypeORM 엔티티 등록 (OneLink, SurveyResponse, Survey, SurveyQuestion)
 * - Repository 구현체 제공
 * - surveys / questions 테이블은 설문 작성 기능 소유 (읽기 전용, synchronize 제외)
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([
      OneLinkOrmEntity,
      SurveyResponseOrmEntity,
      SurveyOrmEntity,
      SurveyQuestionOrmEntity,
    ]),
  ],
  providers: [
    {
      provide: ONE_LINK_REPOSITORY,
      useClass: OneLinkRepository,
    },
    {
      provide: SURVEY_RESPONSE_REPOSITORY,
      useClass: SurveyResponseRepository,
    },
    {
      provide: SURVEY_REPOSITORY,
      useClass: SurveyRepository,
    },
    {
      provide: PREFILL_FIELD_VALIDATOR,
      useClass: SurveyQuestionPrefillValidator,
    },
  ],
  exports: [
    ONE_LINK_REPOSITORY,
    SURVEY_RESPONSE_REPOSITORY,
    SURVEY_REPOSITORY,
    PREFILL_FIELD_VALIDATOR,
  ],
})
export class OneLinkInfraModule {}
