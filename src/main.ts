import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ANALYTICS_CONFIG, AnalyticsConfig } from './config/analytics.config';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  const config = app.get<AnalyticsConfig>(ANALYTICS_CONFIG);
  await app.listen(config.port);
  logger.log(`Holdings analytics API listening on http://localhost:${config.port}`);
}

bootstrap().catch((error: unknown) => {
  logger.error('Failed to start server', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
