/**
 * Share Link Controller Swagger 데코레이터
 */
import { applyDecorators } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiResponse } from '@nestjs/swagger';
import { CreateShareLinkRequestDto, ShareLinkResponseDto } from './dto/share-link.dto';

/**
 * 공유 링크 발급 API 문서
 */
export const ApiCreateShareLink = () =>
  applyDecorators(
    ApiOperation({
      summary: '설문 공유 링크 발급',
      description: `
설문 응답용 일회용 링크를 발급합니다.

### 동작
- 프리필 값과 만료 시각이 암호화되어 토큰에 봉인됩니다.
- 링크는 한 번의 응답 제출에만 사용할 수 있습니다. 열람은 여러 번 가능합니다.

### 선택 필드
- \`prefillData\`: 설문 문항의 prefill 키 → 값
- \`expiresAt\`: 만료 일시 (현재 이후, 최대 유효 기간 이내)
      `,
    }),
    ApiParam({ name: 'surveyId', type: Number, description: '설문 ID', example: 42 }),
    ApiBody({ description: '공유 링크 발급 정보', type: CreateShareLinkRequestDto }),
    ApiResponse({ status: 201, description: '발급 성공', type: ShareLinkResponseDto }),
    ApiResponse({ status: 400, description: '알 수 없는 프리필 키(6005) 또는 허용 범위를 벗어난 만료 시각(6006)' }),
    ApiResponse({ status: 500, description: '토큰 생성 실패(6007)' }),
  );
