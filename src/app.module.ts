import { Module, NestModule, MiddlewareConsumer } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { WinstonModule } from 'nest-winston';
import { BusinessModule } from './business/business.module';
import { InterfaceModule } from './interface/interface.module';
import { DatabaseModule } from './infra/database/database.module';
import { RequestContextMiddleware } from './common/middleware/request-context.middleware';
import { createWinstonConfig } from './common/logger/winston.config';

/**
 * 루트 애플리케이션 모듈
 *
 * DDD 구조:
 * - Domain: 엔티티, 토큰 코덱, 리포지토리/포트 인터페이스
 * - Business: 링크 수명주기, 응답 제출 유스케이스
 * - Interface: HTTP 컨트롤러
 * - Infra: PostgreSQL, Redis/인메모리 캐시와 락
 *
 * APP_MODE 환경변수:
 * - 'all' (기본): API + 만료 링크 정리 스케줄러
 * - 'api': API만 실행 (Cron 비활성)
 */
const appMode = process.env.APP_MODE || 'all';

@Module({
  imports: [
    // 환경변수 설정
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    // Winston 구조화 로깅
    WinstonModule.forRoot(createWinstonConfig(process.env.LOG_DIR || 'logs')),
    // 스케줄링 모듈 (Cron 작업용)
    // APP_MODE=api 에서는 미로드 → 모든 @Cron 데코레이터 자동 비활성화
    ...(appMode !== 'api' ? [ScheduleModule.forRoot()] : []),
    // 인프라 레이어
    DatabaseModule,
    // 비즈니스 레이어
    BusinessModule,
    // 인터페이스 레이어
    InterfaceModule,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    // 모든 라우트에 RequestContextMiddleware 적용
    consumer.apply(RequestContextMiddleware).forRoutes('*');
  }
}
