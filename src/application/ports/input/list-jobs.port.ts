import type { ConversionJob } from '../../../domain/entities/conversion-job.entity';

/**
 * List Jobs Port (Driving Port / Use Case Interface)
 */
export interface ListJobsPort {
  /**
   * Every job known to this process, newest first.
   */
  execute(): Promise<ConversionJob[]>;
}
