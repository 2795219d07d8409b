import { IsDateString, IsOptional } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsPrefillData } from '../../../../domain/one-link/validators/is-prefill-data.decorator';
import type { PrefillData } from '../../../../domain/one-link/type/link-payload.type';
import type { IssuedLink } from '../../../../business/one-link/one-link-lifecycle.service';

/**
 * 공유 링크 발급 요청 DTO
 */
export class CreateShareLinkRequestDto {
  @ApiPropertyOptional({
    description: '응답 폼에 미리 채울 값 (키는 설문 문항의 prefill 키)',
    example: { name: 'Alice', department: 'Sales' },
    type: 'object',
    additionalProperties: true,
  })
  @IsOptional()
  @IsPrefillData({
    message: 'prefillData의 값은 문자열, 숫자, 불리언, null 또는 그 배열이어야 하며 __proto__ 등 예약 키는 쓸 수 없습니다.',
  })
  prefillData?: PrefillData;

  @ApiPropertyOptional({
    description: '만료 일시 (미지정 시 기본 유효 기간 적용)',
    format: 'date-time',
    example: '2026-12-31T23:59:59Z',
  })
  @IsOptional()
  @IsDateString({}, { message: 'expiresAt은 ISO 8601 형식이어야 합니다.' })
  expiresAt?: string;
}

/**
 * 공유 링크 발급 응답 DTO
 */
export class ShareLinkResponseDto {
  @ApiProperty({ description: '일회용 접근 토큰', example: 'q3Vx0N1b...' })
  token!: string;

  @ApiProperty({
    description: '응답자에게 전달할 링크',
    example: 'http://localhost:3000/surveys/42?token=q3Vx0N1b...',
  })
  url!: string;

  @ApiProperty({ description: '만료 일시', format: 'date-time' })
  expiresAt!: Date;

  static fromIssued(issued: IssuedLink): ShareLinkResponseDto {
    const dto = new ShareLinkResponseDto();
    dto.token = issued.token;
    dto.url = issued.url;
    dto.expiresAt = issued.expiresAt;
    return dto;
  }
}
