import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsAnswerValue } from '../../../../domain/survey-response/validators/is-answer-value.decorator';
import type { PrefillData, PrefillValue } from '../../../../domain/one-link/type/link-payload.type';
import type { AnswerValue } from '../../../../domain/survey-response/type/answer-value.type';
import type { SurveyResponse } from '../../../../domain/survey-response/entities/survey-response.entity';
import type { QuestionConfig } from '../../../../domain/survey/entities/survey.entity';
import type {
  PublicSurveyAccess,
  PublicSurveyQuestion,
} from '../../../../business/one-link/share-link.service';

/**
 * 링크 토큰 쿼리 DTO
 */
export class LinkTokenQueryDto {
  @ApiProperty({ description: '일회용 접근 토큰', example: 'q3Vx0N1b...' })
  @IsString()
  @IsNotEmpty({ message: '토큰을 입력해주세요.' })
  token!: string;
}

/**
 * 공개 설문 문항 DTO (프리필 값 포함)
 */
export class PublicSurveyQuestionDto {
  @ApiProperty({ description: '문항 ID', example: 1 })
  id!: number;

  @ApiProperty({ description: '문항 유형', enum: ['text', 'single', 'multiple', 'table'], example: 'text' })
  type!: string;

  @ApiProperty({ description: '문항 제목', example: '이름' })
  title!: string;

  @ApiProperty({ description: '문항 설명', example: '' })
  description!: string;

  @ApiProperty({ description: '필수 여부', example: true })
  required!: boolean;

  @ApiProperty({ description: '표시 순서', example: 1 })
  order!: number;

  @ApiProperty({
    description: '유형별 설정 (선택지, 표 열, 행 수 제한)',
    example: { options: ['red', 'blue'] },
    type: 'object',
    additionalProperties: true,
  })
  config!: QuestionConfig;

  @ApiProperty({ description: '프리필 키', example: 'name', nullable: true })
  prefillKey!: string | null;

  @ApiPropertyOptional({ description: '링크에 봉인된 프리필 값', example: 'Alice' })
  prefillValue?: PrefillValue;

  static fromQuestion(question: PublicSurveyQuestion): PublicSurveyQuestionDto {
    const dto = new PublicSurveyQuestionDto();
    dto.id = question.id;
    dto.type = question.type;
    dto.title = question.title;
    dto.description = question.description;
    dto.required = question.required;
    dto.order = question.order;
    dto.config = question.config;
    dto.prefillKey = question.prefillKey;
    if ('prefillValue' in question) {
      dto.prefillValue = question.prefillValue;
    }
    return dto;
  }
}

/**
 * 공개 설문 열람 응답 DTO
 */
export class PublicSurveyResponseDto {
  @ApiProperty({ description: '링크 ID', example: 1 })
  oneLinkId!: number;

  @ApiProperty({ description: '설문 ID', example: 42 })
  surveyId!: number;

  @ApiProperty({ description: '설문 제목', example: '만족도 조사' })
  title!: string;

  @ApiProperty({ description: '설문 설명', example: '' })
  description!: string;

  @ApiProperty({ description: '문항 목록 (표시 순서)', type: [PublicSurveyQuestionDto] })
  questions!: PublicSurveyQuestionDto[];

  @ApiProperty({
    description: '미리 채울 값 (없으면 null)',
    example: { name: 'Alice' },
    type: 'object',
    additionalProperties: true,
    nullable: true,
  })
  prefillData!: PrefillData | null;

  @ApiProperty({ description: '링크 만료 일시', format: 'date-time' })
  expiresAt!: Date;

  static fromAccess(access: PublicSurveyAccess): PublicSurveyResponseDto {
    const dto = new PublicSurveyResponseDto();
    dto.oneLinkId = access.oneLinkId;
    dto.surveyId = access.surveyId;
    dto.title = access.title;
    dto.description = access.description;
    dto.questions = access.questions.map((question) => PublicSurveyQuestionDto.fromQuestion(question));
    dto.prefillData = access.prefillData;
    dto.expiresAt = access.expiresAt;
    return dto;
  }
}

/**
 * 문항 응답 DTO
 */
export class SurveyAnswerDto {
  @ApiProperty({ description: '문항 ID', example: 1 })
  @IsInt({ message: 'questionId는 정수여야 합니다.' })
  @Min(1)
  questionId!: number;

  @ApiProperty({
    description: '응답 값 (텍스트/단일 선택: 문자열, 다중 선택: 문자열 배열, 표: 행별 문자열 배열)',
    example: 'Alice',
  })
  @IsAnswerValue()
  value!: AnswerValue;
}

/**
 * 설문 응답 제출 요청 DTO
 */
export class SubmitSurveyResponseRequestDto {
  @ApiProperty({ description: '일회용 접근 토큰', example: 'q3Vx0N1b...' })
  @IsString()
  @IsNotEmpty({ message: '토큰을 입력해주세요.' })
  token!: string;

  @ApiProperty({ description: '문항별 응답', type: [SurveyAnswerDto] })
  @IsArray()
  @ArrayNotEmpty({ message: '응답을 하나 이상 입력해주세요.' })
  @ValidateNested({ each: true })
  @Type(() => SurveyAnswerDto)
  answers!: SurveyAnswerDto[];
}

/**
 * 설문 응답 제출 결과 DTO
 */
export class SubmitSurveyResponseResultDto {
  @ApiProperty({ description: '응답 ID', example: 11 })
  id!: number;

  @ApiProperty({ description: '설문 ID', example: 42 })
  surveyId!: number;

  @ApiProperty({ description: '제출 일시', format: 'date-time' })
  submittedAt!: Date;

  static fromEntity(response: SurveyResponse): SubmitSurveyResponseResultDto {
    const dto = new SubmitSurveyResponseResultDto();
    dto.id = response.id;
    dto.surveyId = response.surveyId;
    dto.submittedAt = response.submittedAt;
    return dto;
  }
}
