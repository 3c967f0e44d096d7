import { DomainEvent } from './base.event';
import type { ConversionOptions } from '../value-objects/conversion-options.vo';

/**
 * Job Queued Event
 * Emitted when an upload has been accepted and handed to the conversion pool
 */
export interface JobQueuedEventPayload {
  jobId: string;
  sourceFilename: string;
  sizeBytes: number;
  options: ConversionOptions;
}

export class JobQueuedEvent extends DomainEvent {
  constructor(public readonly payload: JobQueuedEventPayload) {
    super(payload.jobId);
  }

  get eventName(): string {
    return 'job.queued';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
