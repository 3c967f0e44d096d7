import type { ConversionJob } from '../../../domain/entities/conversion-job.entity';
import type { PageImage } from '../../../domain/value-objects/page-image.vo';

export interface GetJobResultResult {
  job: ConversionJob;
  pages: readonly PageImage[];
}

/**
 * Get Job Port (Driving Port / Use Case Interface)
 */
export interface GetJobPort {
  /**
   * Fails with JobNotFoundError for unknown ids.
   */
  execute(jobId: string): Promise<ConversionJob>;

  /**
   * Ordered page images of a completed job. Fails with JobStateConflictError
   * while the job is still running or when it failed.
   */
  getResult(jobId: string): Promise<GetJobResultResult>;
}
