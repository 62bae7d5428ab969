import 'reflect-metadata';

import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app/app.module';
import { describeError } from './common/errors';
import { AllExceptionsFilter } from './common/filters/http-exception.filter';
import { LoggingService } from './logging/logging.service';

const isPgShutdownError = (error: unknown): boolean => {
  if (!error || typeof error !== 'object') {
    return false;
  }

  if ('code' in error && typeof error.code === 'string') {
    if (['57P01', '57P02', '57P03', '53300'].includes(error.code)) {
      return true;
    }
  }

  return /db_termination|terminating connection|server closed the connection|connection reset/i.test(
    describeError(error),
  );
};

process.on('uncaughtException', (error) => {
  // Pool shutdown errors are handled by DatabaseService
  if (isPgShutdownError(error)) {
    return;
  }

  Logger.error('Uncaught exception', error.stack);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  if (isPgShutdownError(reason)) {
    return;
  }

  Logger.error(`Unhandled promise rejection: ${describeError(reason)}`);
  process.exit(1);
});

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(LoggingService));

  const allowedOrigins = ['http://localhost:3000', 'http://localhost:5000'];
  const frontendUrl = process.env.FRONTEND_URL;
  if (frontendUrl) {
    allowedOrigins.push(frontendUrl);
  }
  app.enableCors({ origin: allowedOrigins, credentials: true });

  app.useGlobalFilters(new AllExceptionsFilter());
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));

  const globalPrefix = 'api';
  app.setGlobalPrefix(globalPrefix);
  const port = process.env.PORT || 8080;
  await app.listen(port);
  Logger.log(`Application is running on: http://localhost:${port}/${globalPrefix}`);
}

bootstrap().catch((error: unknown) => {
  Logger.error(`Failed to start: ${describeError(error)}`);
  process.exit(1);
});
