import { SurveyResponse } from '../../../domain/survey-response/entities/survey-response.entity';
import { SurveyResponseOrmEntity } from '../entities/survey-response.orm-entity';

export class SurveyResponseMapper {
  static toDomain(ormEntity: SurveyResponseOrmEntity): SurveyResponse {
    return new SurveyResponse({
      id: ormEntity.id,
      surveyId: ormEntity.surveyId,
      oneLinkId: ormEntity.oneLinkId,
      answers: ormEntity.answers,
      ipAddress: ormEntity.ipAddress,
      userAgent: ormEntity.userAgent,
      submittedAt: ormEntity.submittedAt,
    });
  }
}
