import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger, ValidationPipe, type LoggerService } from '@nestjs/common';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { AppModule } from './app.module';
import { GlobalExceptionFilter } from './common/exceptions/global-exception.filter';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);

  // Winston 로거를 NestJS 기본 로거로 교체
  const winstonLogger = app.get<LoggerService>(WINSTON_MODULE_NEST_PROVIDER);
  app.useLogger(winstonLogger);

  const allowedOrigins = process.env.CORS_ORIGIN
    ? process.env.CORS_ORIGIN.split(',').map((o) => o.trim())
    : [];
  app.enableCors({ origin: allowedOrigins });

  // 전역 유효성 검증 파이프 설정
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true, // 자동 타입 변환 활성화
    }),
  );

  // 전역 예외 필터 등록
  app.useGlobalFilters(new GlobalExceptionFilter(winstonLogger));

  // Swagger 설정
  const config = new DocumentBuilder()
    .setTitle('One-Time Survey Link API')
    .setDescription('설문 응답용 일회용 링크 발급/열람/제출 API 문서')
    .setVersion('1.0')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api-docs', app, document, {
    swaggerOptions: {
      tagsSorter: 'alpha', // 태그를 알파벳/숫자 순서로 정렬
      operationsSorter: 'alpha', // 각 태그 내 API도 정렬
    },
  });

  const port = process.env.PORT ?? 3000;
  await app.listen(port);

  const logger = new Logger('Main');
  logger.log(`🚀 App server running on http://localhost:${port}`);
  logger.log(`📚 Swagger docs at http://localhost:${port}/api-docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Main').error(
    `Bootstrap failed: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error.stack : undefined,
  );
  process.exit(1);
});
