import type { AnswerValue } from '../type/answer-value.type';

/**
 * 문항별 응답 값
 */
export interface SurveyAnswer {
  questionId: number;
  value: AnswerValue;
}

/**
 * SurveyResponse 도메인 엔티티
 *
 * 일회성 링크로 제출된 설문 응답. 링크당 최대 1건.
 */
export class SurveyResponse {
  id: number;
  surveyId: number;
  oneLinkId: number;
  answers: SurveyAnswer[];
  ipAddress: string;
  userAgent: string;
  submittedAt: Date;

  constructor(props: {
    id: number;
    surveyId: number;
    oneLinkId: number;
    answers: SurveyAnswer[];
    ipAddress: string;
    userAgent: string;
    submittedAt: Date;
  }) {
    this.id = props.id;
    this.surveyId = props.surveyId;
    this.oneLinkId = props.oneLinkId;
    this.answers = props.answers;
    this.ipAddress = props.ipAddress;
    this.userAgent = props.userAgent;
    this.submittedAt = props.submittedAt;
  }
}
