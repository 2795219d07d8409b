import { Survey } from '../entities/survey.entity';

/**
 * Survey Repository 인터페이스 (읽기 전용)
 */
export interface ISurveyRepository {
  /**
   * 설문과 문항을 함께 조회 (문항은 order, id 순)
   */
  findByIdWithQuestions(surveyId: number): Promise<Survey | null>;
}

export const SURVEY_REPOSITORY = Symbol('SURVEY_REPOSITORY');
