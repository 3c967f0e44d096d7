import { DomainEvent } from './base.event';
import type { ConversionErrorKind } from '../errors/conversion.errors';

/**
 * Job Failed Event
 * Emitted when a conversion job reaches the failed state
 */
export interface JobFailedEventPayload {
  jobId: string;
  kind: ConversionErrorKind;
  errorMessage: string;
  failedDuring: string;
  durationMs: number;
}

export class JobFailedEvent extends DomainEvent {
  constructor(public readonly payload: JobFailedEventPayload) {
    super(payload.jobId);
  }

  get eventName(): string {
    return 'job.failed';
  }

  get kind(): ConversionErrorKind {
    return this.payload.kind;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
