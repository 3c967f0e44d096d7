import type { ConversionJob } from '../../../domain/entities/conversion-job.entity';
import type { ConversionOptions } from '../../../domain/value-objects/conversion-options.vo';

export interface CreateJobProps {
  sourceFilename: string;
  options: ConversionOptions;
}

/**
 * Pure function from the current snapshot to the next one.
 */
export type JobMutation = (job: ConversionJob) => ConversionJob;

/**
 * Job Registry Port (Driven Port)
 * Holds every job known to this process
 *
 * Stored jobs are immutable snapshots; `update` swaps one snapshot for the
 * next, so readers never observe a half-applied change.
 */
export interface JobRegistryPort {
  /**
   * Allocate a new job id and store the job in the queued state.
   */
  create(props: CreateJobProps): Promise<ConversionJob>;

  get(jobId: string): Promise<ConversionJob | null>;

  /**
   * Like get, but fails with JobNotFoundError for unknown ids.
   */
  require(jobId: string): Promise<ConversionJob>;

  update(jobId: string, mutation: JobMutation): Promise<ConversionJob>;

  /**
   * Newest first.
   */
  list(): Promise<ConversionJob[]>;

  delete(jobId: string): Promise<boolean>;

  /**
   * Terminal jobs that finished before `cutoff`.
   */
  findTerminalBefore(cutoff: Date): Promise<ConversionJob[]>;

  count(): Promise<number>;
}
