import { Inject, Injectable, type NestMiddleware } from '@nestjs/common';
import type { IncomingMessage, ServerResponse } from 'http';
import { v4 as uuidv4 } from 'uuid';
import { PinoLoggerService } from './pino-logger.service';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

export function readCorrelationId(req: IncomingMessage): string | undefined {
  const header = req.headers[CORRELATION_ID_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim().length > 0 ? value : undefined;
}

/**
 * Echoes the caller's correlation id, or a fresh one, on every response and
 * logs the finished request under it.
 * Runs on the raw Node request under the Fastify adapter.
 */
@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  private readonly logger: PinoLoggerService;

  constructor(@Inject(PinoLoggerService) logger: PinoLoggerService) {
    this.logger = logger.forContext('HTTP');
  }

  use(req: IncomingMessage, res: ServerResponse, next: () => void): void {
    const correlationId = readCorrelationId(req) ?? uuidv4();
    const startedAt = Date.now();

    req.headers[CORRELATION_ID_HEADER] = correlationId;
    res.setHeader(CORRELATION_ID_HEADER, correlationId);

    res.once('finish', () => {
      this.logger.withCorrelationId(correlationId).info(
        {
          method: req.method,
          url: req.url,
          statusCode: res.statusCode,
          durationMs: Date.now() - startedAt,
        },
        'Request completed',
      );
    });

    next();
  }
}
