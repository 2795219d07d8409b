import { Body, Controller, Get, Param, ParseIntPipe, Post, Query, Res } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { ShareLinkService } from '../../../business/one-link/share-link.service';
import { SurveyResponseSubmitService } from '../../../business/survey-response/survey-response-submit.service';
import {
  LinkTokenQueryDto,
  PublicSurveyResponseDto,
  SubmitSurveyResponseRequestDto,
  SubmitSurveyResponseResultDto,
} from './dto/public-survey.dto';
import { ApiOpenSurvey, ApiSubmitResponse } from './public-survey.swagger';

/**
 * 공개 설문 컨트롤러
 *
 * 응답자가 일회용 링크로 접근하는 API (인증 없음, 토큰이 접근 권한)
 */
@ApiTags('200.공개 설문')
@Controller('v1/public')
export class PublicSurveyController {
  constructor(
    private readonly shareLinkService: ShareLinkService,
    private readonly submitService: SurveyResponseSubmitService,
  ) {}

  /**
   * GET /v1/public/surveys/:surveyId?token=
   */
  @Get('surveys/:surveyId')
  @ApiOpenSurvey()
  async openSurvey(
    @Param('surveyId', ParseIntPipe) surveyId: number,
    @Query() query: LinkTokenQueryDto,
  ): Promise<PublicSurveyResponseDto> {
    const access = await this.shareLinkService.openSurvey(surveyId, query.token);
    return PublicSurveyResponseDto.fromAccess(access);
  }

  /**
   * POST /v1/public/responses
   *
   * 클라이언트 연결이 응답 전에 끊기면 제출 처리를 중단한다.
   */
  @Post('responses')
  @ApiSubmitResponse()
  async submitResponse(
    @Body() dto: SubmitSurveyResponseRequestDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<SubmitSurveyResponseResultDto> {
    const abortController = new AbortController();
    const onClose = (): void => {
      if (!res.writableFinished) {
        abortController.abort(new Error('client disconnected'));
      }
    };
    res.on('close', onClose);

    try {
      const response = await this.submitService.submit(
        dto.token,
        dto.answers.map((answer) => ({ questionId: answer.questionId, value: answer.value })),
        abortController.signal,
      );
      return SubmitSurveyResponseResultDto.fromEntity(response);
    } finally {
      res.off('close', onClose);
    }
  }
}
