import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ZodValidationPipe } from 'nestjs-zod';
import { AppModule } from './app.module';
import { MONITOR_CONFIG, parseMonitorConfig, resolveLogLevels, type MonitorConfig } from './config/monitor.config';

async function bootstrap() {
  // 모듈이 뜨기 전 로그 레벨만 환경 변수에서 먼저 읽는다.
  const { logLevel } = parseMonitorConfig(process.env);
  const app = await NestFactory.create(AppModule, {
    logger: resolveLogLevels(logLevel),
    cors: {
      origin: true,
      credentials: true,
      exposedHeaders: ['x-request-id'],
    },
  });

  app.setGlobalPrefix('api');
  app.useGlobalPipes(new ZodValidationPipe());
  app.enableShutdownHooks();

  const config = app.get<MonitorConfig>(MONITOR_CONFIG);
  await app.listen(config.port);
  Logger.log(`Link state engine listening on http://localhost:${config.port}`, 'Bootstrap');
}
bootstrap().catch((error) => {
  Logger.error(error, 'Bootstrap');
  process.exit(1);
});
