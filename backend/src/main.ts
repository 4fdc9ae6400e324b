import 'reflect-metadata';

import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app/app.module';
import { AllExceptionsFilter } from './common/filters/http-exception.filter';
import { readString } from './common/utils/payload-reader';
import { readList, readNumber } from './config/config.helpers';
import { LoggingService } from './logging/logging.service';

const isPgShutdownError = (error: unknown): boolean => {
  const code = readString(error, 'code');
  if (code && ['57P01', '57P02', '57P03', '53300'].includes(code)) {
    return true;
  }

  const message = readString(error, 'message') ?? '';
  return /db_termination|terminating connection|server closed the connection|connection reset/i.test(
    message,
  );
};

process.on('uncaughtException', (error) => {
  if (isPgShutdownError(error)) {
    // DatabaseService recreates the pool on next use
    return;
  }

  Logger.error('Uncaught exception', error.stack);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  if (isPgShutdownError(reason)) {
    return;
  }

  Logger.error('Unhandled promise rejection', reason instanceof Error ? reason.stack : String(reason));
  process.exit(1);
});

async function bootstrap() {
  // rawBody keeps the exact bytes for webhook signature checks
  const app = await NestFactory.create(AppModule, { rawBody: true, bufferLogs: true });
  app.useLogger(app.get(LoggingService));

  const config = app.get(ConfigService);
  const allowedOrigins = readList(config, 'CORS_ORIGINS', []);
  if (allowedOrigins.length > 0) {
    app.enableCors({ origin: allowedOrigins });
  }

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, forbidUnknownValues: false }));
  app.useGlobalFilters(new AllExceptionsFilter());
  app.enableShutdownHooks();

  const globalPrefix = 'api';
  app.setGlobalPrefix(globalPrefix);
  const port = readNumber(config, 'PORT', 8080);
  await app.listen(port);
  Logger.log(`Application is running on: http://localhost:${port}/${globalPrefix}`);
}

bootstrap().catch((error: unknown) => {
  Logger.error('Bootstrap failed', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
