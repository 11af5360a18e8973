import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import type { Request, Response } from 'express';
import { AppModule } from './app.module';
import { GlobalExceptionFilter } from './common/filters/global-exception.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');

  // 글로벌 예외 필터 등록
  app.useGlobalFilters(new GlobalExceptionFilter());

  // 글로벌 유효성 검사 파이프 등록
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // CORS 설정
  app.enableCors({
    origin: process.env.NODE_ENV === 'production' ? false : true,
    credentials: true,
  });

  // Swagger 설정
  const config = new DocumentBuilder()
    .setTitle('프로젝트 원장 리포트 API')
    .setDescription(
      `프로젝트 시스템 내보내기 파일을 정리하고 WBS 코드를 분류하여 카탈로그 설명과 금액 서식을 적용하는 API 문서\n\n
      ## 사용 방법\n
      1. \`/api/v1/catalog/status\` 로 카탈로그 상태를 확인합니다.\n
      2. 필요하면 \`/api/v1/catalog/import\` 로 마스터 카탈로그를 가져옵니다.\n
      3. \`/api/v1/reports/{reportType}/process\` 에 내보내기 파일을 업로드합니다.`,
    )
    .setVersion('1.0')
    .addTag('reports', '📄 리포트 처리 API')
    .addTag('catalog', '📚 참조 카탈로그 API')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  // 헬스 체크 엔드포인트
  app.getHttpAdapter().get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  await app.listen(process.env.PORT ?? 3000);
  logger.log(`Application is running on: ${await app.getUrl()}`);
  logger.log(`Swagger documentation: ${await app.getUrl()}/api/docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Application failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
