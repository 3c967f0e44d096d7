import { Inject, Injectable } from '@nestjs/common';
import type { EventPublisherPort } from '../../../application/ports/output/event-publisher.port';
import type { DomainEvent } from '../../../domain/events/base.event';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * Log Event Publisher Adapter
 * Implements EventPublisherPort by writing each event to the structured log
 */
@Injectable()
export class LogEventPublisherAdapter implements EventPublisherPort {
  private readonly logger: PinoLoggerService;

  constructor(@Inject(PinoLoggerService) logger: PinoLoggerService) {
    this.logger = logger.forContext(LogEventPublisherAdapter.name);
  }

  async publish(event: DomainEvent): Promise<void> {
    this.logger.info({ event: event.toJSON() }, `[EVENT] ${event.eventName}`);
  }

  publishAsync(event: DomainEvent): void {
    // Fire and forget
    this.publish(event).catch((error) => {
      this.logger.error(
        {
          eventName: event.eventName,
          error: error instanceof Error ? error.message : String(error),
        },
        'Failed to publish event',
      );
    });
  }
}
