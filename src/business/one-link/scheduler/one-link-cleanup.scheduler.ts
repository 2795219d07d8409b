/**
 * 만료 링크 정리 스케줄러
 *
 * expires_at이 지난 one_links 레코드를 매시간 삭제합니다.
 * 링크가 삭제되는 유일한 경로입니다.
 */
import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import {
  ONE_LINK_REPOSITORY,
  type IOneLinkRepository,
} from '../../../domain/one-link/repositories/one-link.repository.interface';

@Injectable()
export class OneLinkCleanupScheduler {
  private readonly logger = new Logger(OneLinkCleanupScheduler.name);

  /** 중복 실행 방지 플래그 */
  private isRunning = false;

  constructor(
    @Inject(ONE_LINK_REPOSITORY)
    private readonly linkRepository: IOneLinkRepository,
  ) {}

  @Cron(CronExpression.EVERY_HOUR)
  async runScheduledCleanup(): Promise<void> {
    await this.runCleanup();
  }

  /**
   * 만료 링크 정리 실행 (수동 호출 가능)
   * @returns 삭제된 링크 수
   */
  async runCleanup(now: Date = new Date()): Promise<number> {
    if (this.isRunning) {
      this.logger.warn('Expired link cleanup already in progress, skipping...');
      return 0;
    }

    this.isRunning = true;
    try {
      const deleted = await this.linkRepository.deleteExpired(now);
      if (deleted > 0) {
        this.logger.log(`Expired links deleted: ${deleted}`);
      } else {
        this.logger.debug('No expired links to delete');
      }
      return deleted;
    } catch (error) {
      this.logger.error(
        `Expired link cleanup failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return 0;
    } finally {
      this.isRunning = false;
    }
  }
}
