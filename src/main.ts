import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { INestApplication, ValidationPipe } from '@nestjs/common';
import { AppModule } from './app.module';
import { AppLogger } from './common/logger/app-logger.service';
import { LoggingInterceptor } from './common/interceptors/logging.interceptor';

export function configureApp(app: INestApplication): void {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.useGlobalInterceptors(new LoggingInterceptor());
}

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });

  const logger = AppLogger.create('Application');
  app.useLogger(logger);
  configureApp(app);
  app.enableShutdownHooks();

  const port = process.env.PORT ?? 3000;
  await app.listen(port);

  logger.info('Application started', {
    event: 'app_start',
    port: Number(port),
    nodeEnv: process.env.NODE_ENV || 'development',
  });
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    AppLogger.create('Application').fatal('Application failed to start', {
      event: 'app_start_failed',
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}
