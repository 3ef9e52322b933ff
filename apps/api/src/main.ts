import 'reflect-metadata';
import { config as dotenvConfig } from 'dotenv';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module.js';
import { ConfigService } from './config/config.service.js';
import { FileLogger } from './logging/file-logger.js';
import { redactSecret } from './logging/redact.js';

async function bootstrap() {
  // In dev, prefer values from .env over pre-set shell vars to avoid stale keys.
  dotenvConfig({ override: process.env.NODE_ENV !== 'production' });

  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const logger = app.get(FileLogger);
  app.useLogger(logger);
  // Closes the log file among the other shutdown hooks
  app.enableShutdownHooks();

  const config = app.get(ConfigService);
  logger.log(`OPENAI_API_KEY: ${redactSecret(config.env.OPENAI_API_KEY)}`);
  logger.log(`ANTHROPIC_API_KEY: ${redactSecret(config.env.ANTHROPIC_API_KEY)}`);
  logger.log(`Meeting store: ${config.meetingsFile}`);

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Voice Desk API')
    .setDescription('Meetings booked by the voice assistant')
    .setVersion('0.1.0')
    .build();
  const swaggerDoc = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('docs', app, swaggerDoc);

  await app.listen(config.port);
  logger.log(`Listening on port ${config.port}`);
}

bootstrap().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start Voice Desk API', err);
  process.exit(1);
});
