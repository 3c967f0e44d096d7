import { DomainEvent } from './base.event';

/**
 * Job Completed Event
 * Emitted when every page of a document has been rasterized and stored
 */
export interface JobCompletedEventPayload {
  jobId: string;
  pageCount: number;
  totalBytes: number;
  durationMs: number;
}

export class JobCompletedEvent extends DomainEvent {
  constructor(public readonly payload: JobCompletedEventPayload) {
    super(payload.jobId);
  }

  get eventName(): string {
    return 'job.completed';
  }

  get pageCount(): number {
    return this.payload.pageCount;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
