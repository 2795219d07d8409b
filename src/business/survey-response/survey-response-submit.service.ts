import { Inject, Injectable, Logger } from '@nestjs/common';
import { RequestContext } from '../../common/context/request-context';
import { BusinessException, ErrorCodes } from '../../common/exceptions';
import type { SurveyAnswer } from '../../domain/survey-response/entities/survey-response.entity';
import { SurveyResponse } from '../../domain/survey-response/entities/survey-response.entity';
import {
  SURVEY_RESPONSE_REPOSITORY,
  type ISurveyResponseRepository,
} from '../../domain/survey-response/repositories/survey-response.repository.interface';
import {
  SURVEY_REPOSITORY,
  type ISurveyRepository,
} from '../../domain/survey/repositories/survey.repository.interface';
import {
  AnswerViolationKind,
  findAnswerViolation,
} from '../../domain/survey/service/survey-answer.validator';
import type { OneLink } from '../../domain/one-link/entities/one-link.entity';
import { OneLinkLifecycleService } from '../one-link/one-link-lifecycle.service';
import { unwrapLinkResult } from '../one-link/link-error.mapper';

/**
 * SurveyResponseSubmitService
 *
 * 일회용 링크로 설문 응답 제출
 * 설문 상태 확인, 응답 검증, 저장이 모두 링크 소비 구간 안에서 실행된다.
 * 검증에 실패하면 예외가 전파되어 링크는 미사용으로 남는다.
 */
@Injectable()
export class SurveyResponseSubmitService {
  private readonly logger = new Logger(SurveyResponseSubmitService.name);

  constructor(
    private readonly lifecycleService: OneLinkLifecycleService,
    @Inject(SURVEY_RESPONSE_REPOSITORY)
    private readonly responseRepository: ISurveyResponseRepository,
    @Inject(SURVEY_REPOSITORY)
    private readonly surveyRepository: ISurveyRepository,
  ) {}

  async submit(
    token: string,
    answers: SurveyAnswer[],
    signal?: AbortSignal,
  ): Promise<SurveyResponse> {
    const result = await this.lifecycleService.consumeLink(
      token,
      async (link) => {
        await this.validateAnswers(link, answers);

        const response = await this.responseRepository.create({
          surveyId: link.resourceId,
          oneLinkId: link.id,
          answers,
          ipAddress: RequestContext.getIpAddress(),
          userAgent: RequestContext.getUserAgent(),
          submittedAt: new Date(),
        });
        this.logger.log(
          `Survey response stored: responseId=${response.id} surveyId=${response.surveyId} answers=${answers.length}`,
        );
        return response;
      },
      { signal },
    );

    return unwrapLinkResult(result);
  }

  /**
   * 설문 존재/게시 상태 확인 후 응답을 문항 설정과 대조
   */
  private async validateAnswers(link: OneLink, answers: SurveyAnswer[]): Promise<void> {
    const survey = await this.surveyRepository.findByIdWithQuestions(link.resourceId);
    if (!survey) {
      throw BusinessException.of(ErrorCodes.SURVEY_NOT_FOUND, {
        surveyId: link.resourceId,
        oneLinkId: link.id,
      });
    }

    if (!survey.isPublished()) {
      throw BusinessException.of(ErrorCodes.SURVEY_NOT_PUBLISHED, {
        surveyId: survey.id,
        status: survey.status,
        oneLinkId: link.id,
      });
    }

    const violation = findAnswerViolation(survey.questions, answers);
    if (violation) {
      const errorDef =
        violation.kind === AnswerViolationKind.REQUIRED_MISSING
          ? ErrorCodes.SURVEY_REQUIRED_ANSWER_MISSING
          : ErrorCodes.SURVEY_INVALID_ANSWER;
      throw BusinessException.of(errorDef, {
        surveyId: survey.id,
        oneLinkId: link.id,
        questionId: violation.questionId,
        kind: violation.kind,
        reason: violation.message,
      });
    }
  }
}
