import type { ConversionJob } from '../../../domain/entities/conversion-job.entity';

/**
 * Run Conversion Command
 */
export interface RunConversionCommand {
  jobId: string;
  content: Buffer;
  /** Lowercase, dot-prefixed extension of the upload, e.g. `.pptx`. */
  extension: string;
  /** When the job was queued; used for the waited-time metric. */
  queuedAt?: Date;
}

/**
 * Run Conversion Port (Driving Port / Use Case Interface)
 * Drives one job from queued to a terminal state
 */
export interface RunConversionPort {
  /**
   * Resolves with the terminal snapshot. Conversion failures end up on the
   * job, not as a rejection.
   */
  execute(command: RunConversionCommand): Promise<ConversionJob>;
}
