import { Inject, Injectable } from '@nestjs/common';
import { BusinessException, ErrorCodes } from '../../common/exceptions';
import type { PrefillData, PrefillValue } from '../../domain/one-link/type/link-payload.type';
import type { QuestionConfig, SurveyQuestion } from '../../domain/survey/entities/survey.entity';
import {
  SURVEY_REPOSITORY,
  type ISurveyRepository,
} from '../../domain/survey/repositories/survey.repository.interface';
import { OneLinkLifecycleService, type IssuedLink } from './one-link-lifecycle.service';
import { unwrapLinkResult } from './link-error.mapper';

/**
 * 프리필 값이 합쳐진 문항
 */
export interface PublicSurveyQuestion {
  id: number;
  type: string;
  title: string;
  description: string;
  required: boolean;
  order: number;
  config: QuestionConfig;
  prefillKey: string | null;
  /** 링크 프리필에 문항의 prefillKey가 있을 때만 존재 */
  prefillValue?: PrefillValue;
}

/**
 * 공개 설문 조회 결과
 */
export interface PublicSurveyAccess {
  oneLinkId: number;
  surveyId: number;
  title: string;
  description: string;
  questions: PublicSurveyQuestion[];
  prefillData: PrefillData | null;
  expiresAt: Date;
}

/**
 * ShareLinkService
 *
 * 설문 공유 링크 유스케이스
 * - 설문 작성자: 일회용 응답 링크 발급
 * - 응답자: 링크로 설문 열람 (링크는 소비되지 않음)
 */
@Injectable()
export class ShareLinkService {
  constructor(
    private readonly lifecycleService: OneLinkLifecycleService,
    @Inject(SURVEY_REPOSITORY)
    private readonly surveyRepository: ISurveyRepository,
  ) {}

  /**
   * 공유 링크 발급
   */
  async createShareLink(
    surveyId: number,
    prefillData?: PrefillData,
    expiresAt?: Date,
  ): Promise<IssuedLink> {
    return unwrapLinkResult(
      await this.lifecycleService.issueLink(surveyId, prefillData, expiresAt),
    );
  }

  /**
   * 링크로 설문 열람
   * 경로의 설문 ID와 토큰에 봉인된 설문 ID가 다르면 거절한다.
   * 문항마다 prefillKey에 해당하는 프리필 값을 붙여 반환한다.
   */
  async openSurvey(surveyId: number, token: string): Promise<PublicSurveyAccess> {
    const preview = unwrapLinkResult(await this.lifecycleService.previewLink(token));

    if (preview.resourceId !== surveyId) {
      throw BusinessException.of(ErrorCodes.ONE_LINK_RESOURCE_MISMATCH, {
        requestedSurveyId: surveyId,
        linkSurveyId: preview.resourceId,
        oneLinkId: preview.oneLinkId,
      });
    }

    const survey = await this.surveyRepository.findByIdWithQuestions(preview.resourceId);
    if (!survey) {
      throw BusinessException.of(ErrorCodes.SURVEY_NOT_FOUND, {
        surveyId: preview.resourceId,
        oneLinkId: preview.oneLinkId,
      });
    }

    return {
      oneLinkId: preview.oneLinkId,
      surveyId: survey.id,
      title: survey.title,
      description: survey.description,
      questions: survey.questions.map((question) => withPrefill(question, preview.prefill)),
      prefillData: preview.prefill,
      expiresAt: preview.expiresAt,
    };
  }
}

function withPrefill(question: SurveyQuestion, prefill: PrefillData | null): PublicSurveyQuestion {
  const merged: PublicSurveyQuestion = {
    id: question.id,
    type: question.type,
    title: question.title,
    description: question.description,
    required: question.required,
    order: question.order,
    config: question.config,
    prefillKey: question.prefillKey,
  };
  if (question.prefillKey && prefill && Object.hasOwn(prefill, question.prefillKey)) {
    merged.prefillValue = prefill[question.prefillKey];
  }
  return merged;
}
