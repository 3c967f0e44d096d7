import { DomainEvent } from './base.event';

/**
 * Job Started Event
 * Emitted when a pool slot picks the job up and its workspace is ready
 */
export interface JobStartedEventPayload {
  jobId: string;
  workspacePath: string;
  waitedMs: number;
}

export class JobStartedEvent extends DomainEvent {
  constructor(public readonly payload: JobStartedEventPayload) {
    super(payload.jobId);
  }

  get eventName(): string {
    return 'job.started';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
