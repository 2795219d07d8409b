import {
  QuestionConfig,
  Survey,
  SurveyQuestion,
} from '../../../domain/survey/entities/survey.entity';
import { SurveyOrmEntity } from '../entities/survey.orm-entity';
import {
  QuestionConfigRecord,
  SurveyQuestionOrmEntity,
} from '../entities/survey-question.orm-entity';

/**
 * Survey Mapper
 *
 * surveys / questions 행을 도메인 엔티티로 변환
 */
export class SurveyMapper {
  static toDomain(survey: SurveyOrmEntity, questions: SurveyQuestionOrmEntity[]): Survey {
    return new Survey({
      id: survey.id,
      title: survey.title,
      description: survey.description ?? '',
      status: survey.status,
      questions: questions.map((question) => SurveyMapper.toQuestion(question)),
    });
  }

  static toQuestion(ormEntity: SurveyQuestionOrmEntity): SurveyQuestion {
    return new SurveyQuestion({
      id: ormEntity.id,
      surveyId: ormEntity.surveyId,
      type: ormEntity.type,
      title: ormEntity.title,
      description: ormEntity.description ?? '',
      required: ormEntity.required,
      order: ormEntity.order,
      config: SurveyMapper.toConfig(ormEntity.config),
      prefillKey: ormEntity.prefillKey,
    });
  }

  private static toConfig(record: QuestionConfigRecord | null): QuestionConfig {
    if (!record) {
      return {};
    }
    const config: QuestionConfig = {};
    if (record.options !== undefined) config.options = record.options;
    if (record.columns !== undefined) config.columns = record.columns;
    if (record.min_rows !== undefined) config.minRows = record.min_rows;
    if (record.max_rows !== undefined) config.maxRows = record.max_rows;
    if (record.can_add_row !== undefined) config.canAddRow = record.can_add_row;
    return config;
  }
}
