import { Inject, Injectable } from '@nestjs/common';
import type { GetJobPort, GetJobResultResult } from '../ports/input/get-job.port';
import type { JobRegistryPort } from '../ports/output/job-registry.port';
import { JOB_REGISTRY_PORT } from '../ports/output/injection-tokens';
import type { ConversionJob } from '../../domain/entities/conversion-job.entity';
import { JobStateConflictError } from '../../domain/errors/conversion.errors';

/**
 * Get Job Use Case
 * Read side of a single job: status snapshot and final page list
 */
@Injectable()
export class GetJobUseCase implements GetJobPort {
  constructor(@Inject(JOB_REGISTRY_PORT) private readonly jobRegistry: JobRegistryPort) {}

  async execute(jobId: string): Promise<ConversionJob> {
    return this.jobRegistry.require(jobId);
  }

  async getResult(jobId: string): Promise<GetJobResultResult> {
    const job = await this.jobRegistry.require(jobId);
    const status = job.status.toString();

    if (job.status.isFailed()) {
      throw new JobStateConflictError(
        jobId,
        status,
        `Job ${jobId} failed: ${job.error?.message ?? 'unknown error'}`,
        job.error,
      );
    }

    if (!job.status.isCompleted()) {
      throw new JobStateConflictError(jobId, status, `Job ${jobId} is still ${status}`);
    }

    return { job, pages: job.pages };
  }
}
