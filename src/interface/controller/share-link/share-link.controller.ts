import { Body, Controller, Param, ParseIntPipe, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ShareLinkService } from '../../../business/one-link/share-link.service';
import { CreateShareLinkRequestDto, ShareLinkResponseDto } from './dto/share-link.dto';
import { ApiCreateShareLink } from './share-link.swagger';

/**
 * 설문 공유 링크 컨트롤러
 *
 * 설문 작성자가 응답자에게 보낼 일회용 링크를 발급한다.
 */
@ApiTags('100.설문 공유 링크')
@Controller('v1/surveys')
export class ShareLinkController {
  constructor(private readonly shareLinkService: ShareLinkService) {}

  /**
   * POST /v1/surveys/:surveyId/share-links
   */
  @Post(':surveyId/share-links')
  @ApiCreateShareLink()
  async createShareLink(
    @Param('surveyId', ParseIntPipe) surveyId: number,
    @Body() dto: CreateShareLinkRequestDto,
  ): Promise<ShareLinkResponseDto> {
    const issued = await this.shareLinkService.createShareLink(
      surveyId,
      dto.prefillData,
      dto.expiresAt ? new Date(dto.expiresAt) : undefined,
    );
    return ShareLinkResponseDto.fromIssued(issued);
  }
}
