import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, type NestFastifyApplication } from '@nestjs/platform-fastify';
import multipart from '@fastify/multipart';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import type { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

export interface CreateAppOptions {
  /** Keep Nest's own bootstrap logging quiet (tests). */
  silent?: boolean;
}

/**
 * Builds the HTTP application without listening, so tests can drive it
 * through Fastify's inject.
 */
export async function createApp(options: CreateAppOptions = {}): Promise<NestFastifyApplication> {
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), {
    bufferLogs: !options.silent,
    logger: options.silent ? false : undefined,
  });

  return configureApp(app, options);
}

/**
 * Logger, CORS and multipart limits for an application built from AppModule.
 */
export async function configureApp(
  app: NestFastifyApplication,
  options: CreateAppOptions = {},
): Promise<NestFastifyApplication> {
  const configService = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const serverConfig = configService.get('server', { infer: true });
  const uploadConfig = configService.get('upload', { infer: true });

  if (!options.silent) {
    app.useLogger(app.get(PinoLoggerService));
  }

  app.enableCors({
    origin: serverConfig.corsOrigins.includes('*') ? '*' : serverConfig.corsOrigins,
    exposedHeaders: ['x-correlation-id'],
  });

  await app.register(multipart, {
    limits: {
      fileSize: uploadConfig.maxSizeBytes,
      files: 1,
    },
  });

  return app;
}
