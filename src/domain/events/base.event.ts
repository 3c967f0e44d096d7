import { v4 as uuidv4 } from 'uuid';

/**
 * Base Domain Event
 * All conversion job events extend this class
 */
export abstract class DomainEvent {
  public readonly occurredAt: Date;
  public readonly eventId: string;

  protected constructor(public readonly jobId: string) {
    this.occurredAt = new Date();
    this.eventId = uuidv4();
  }

  abstract get eventName(): string;

  toJSON(): Record<string, unknown> {
    return {
      eventId: this.eventId,
      eventName: this.eventName,
      jobId: this.jobId,
      occurredAt: this.occurredAt.toISOString(),
    };
  }
}
