/**
 * Domain Events Barrel Export
 */
export { DomainEvent } from './base.event';
export { JobQueuedEvent, type JobQueuedEventPayload } from './job-queued.event';
export { JobStartedEvent, type JobStartedEventPayload } from './job-started.event';
export { JobCompletedEvent, type JobCompletedEventPayload } from './job-completed.event';
export { JobFailedEvent, type JobFailedEventPayload } from './job-failed.event';
