import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { createApp } from './app.factory';
import type { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

/**
 * Bootstrap the HTTP service
 */
async function bootstrap() {
  const app = await createApp();

  // Get services
  const configService = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const logger = app.get(PinoLoggerService).forContext('Bootstrap');

  // Get configuration
  const server = configService.get('server', { infer: true });
  const nodeEnv = configService.get('nodeEnv', { infer: true });

  // Register shutdown handlers; closing the app drains the conversion pool
  let shuttingDown = false;
  const shutdownHandler = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, draining conversion jobs...');
    await app.close();
    logger.info('Application shut down gracefully');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdownHandler(signal).catch((error: unknown) => {
      logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Shutdown failed',
      );
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(
      { reason: reason instanceof Error ? reason.message : String(reason) },
      'Unhandled rejection',
    );
    process.exit(1);
  });

  await app.listen(server.port, server.host);

  // Log startup
  logger.info(
    {
      nodeEnv,
      pid: process.pid,
      port: server.port,
      host: server.host,
      baseUrl: server.baseUrl,
    },
    'Slide raster service started',
  );
}

bootstrap().catch((error) => {
  console.error('Failed to start service:', error);
  process.exit(1);
});
