/**
 * Public Survey Controller Swagger 데코레이터
 */
import { applyDecorators } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiQuery, ApiResponse } from '@nestjs/swagger';
import {
  PublicSurveyResponseDto,
  SubmitSurveyResponseRequestDto,
  SubmitSurveyResponseResultDto,
} from './dto/public-survey.dto';

/**
 * 링크로 설문 열람 API 문서
 */
export const ApiOpenSurvey = () =>
  applyDecorators(
    ApiOperation({
      summary: '링크로 설문 열람',
      description: `
일회용 링크의 토큰으로 설문을 열람합니다. 링크는 소비되지 않습니다.

### 검증 순서
1. 토큰 복호화 및 무결성 검증
2. 만료 여부
3. 사용 여부 (캐시 → DB)
4. 경로의 설문 ID와 토큰의 설문 ID 일치 여부
5. 설문과 문항 조회

문항의 prefillKey가 링크 프리필에 있으면 해당 문항에 prefillValue가 포함됩니다.
      `,
    }),
    ApiParam({ name: 'surveyId', type: Number, description: '설문 ID', example: 42 }),
    ApiQuery({ name: 'token', type: String, required: true, description: '일회용 접근 토큰' }),
    ApiResponse({ status: 200, description: '열람 성공', type: PublicSurveyResponseDto }),
    ApiResponse({ status: 400, description: '유효하지 않은 토큰(6001) 또는 설문 불일치(6008)' }),
    ApiResponse({ status: 403, description: '이미 사용된 링크(6003)' }),
    ApiResponse({ status: 404, description: '설문 없음(7001)' }),
    ApiResponse({ status: 410, description: '만료된 링크(6002)' }),
  );

/**
 * 설문 응답 제출 API 문서
 */
export const ApiSubmitResponse = () =>
  applyDecorators(
    ApiOperation({
      summary: '설문 응답 제출',
      description: `
일회용 링크로 설문 응답을 제출합니다. 링크당 한 번만 성공합니다.

### 주의사항
- 같은 링크로 동시에 제출하면 하나만 처리되고 나머지는 409를 받습니다.
- 409는 Retry-After 헤더의 시간 뒤에 재시도할 수 있습니다. 재시도 시 이미 제출되었다면 403을 받습니다.
- 응답은 문항 설정과 대조됩니다. 검증에 실패하면 링크는 소비되지 않으므로 수정 후 다시 제출할 수 있습니다.
      `,
    }),
    ApiBody({ description: '응답 제출 정보', type: SubmitSurveyResponseRequestDto }),
    ApiResponse({ status: 201, description: '제출 성공', type: SubmitSurveyResponseResultDto }),
    ApiResponse({
      status: 400,
      description: '유효하지 않은 토큰(6001), 잘못된 응답 값(7003), 필수 문항 누락(7004) 또는 요청 형식 오류',
    }),
    ApiResponse({ status: 403, description: '이미 사용된 링크(6003) 또는 게시되지 않은 설문(7002)' }),
    ApiResponse({ status: 404, description: '설문 없음(7001)' }),
    ApiResponse({ status: 409, description: '동일 링크로 처리 중인 요청 있음(6004)' }),
    ApiResponse({ status: 410, description: '만료된 링크(6002)' }),
  );
