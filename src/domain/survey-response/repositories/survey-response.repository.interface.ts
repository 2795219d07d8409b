import { SurveyResponse } from '../entities/survey-response.entity';

export type CreateSurveyResponseInput = Omit<SurveyResponse, 'id'>;

/**
 * SurveyResponse Repository 인터페이스
 */
export interface ISurveyResponseRepository {
  create(input: CreateSurveyResponseInput): Promise<SurveyResponse>;
}

export const SURVEY_RESPONSE_REPOSITORY = Symbol('SURVEY_RESPONSE_REPOSITORY');
