import { Inject, Injectable } from '@nestjs/common';
import type { DeleteJobPort } from '../ports/input/delete-job.port';
import type { ArtifactStorePort } from '../ports/output/artifact-store.port';
import type { JobRegistryPort } from '../ports/output/job-registry.port';
import { ARTIFACT_STORE_PORT, JOB_REGISTRY_PORT } from '../ports/output/injection-tokens';
import { JobStateConflictError } from '../../domain/errors/conversion.errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

/**
 * Delete Job Use Case
 * Forgets a finished job and removes its page images
 */
@Injectable()
export class DeleteJobUseCase implements DeleteJobPort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(JOB_REGISTRY_PORT) private readonly jobRegistry: JobRegistryPort,
    @Inject(ARTIFACT_STORE_PORT) private readonly artifactStore: ArtifactStorePort,
    @Inject(PinoLoggerService) logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(DeleteJobUseCase.name);
  }

  async execute(jobId: string): Promise<void> {
    const job = await this.jobRegistry.require(jobId);

    if (!job.isTerminal()) {
      const status = job.status.toString();
      throw new JobStateConflictError(
        jobId,
        status,
        `Job ${jobId} is still ${status} and cannot be deleted`,
      );
    }

    await this.artifactStore.remove(jobId);
    await this.jobRegistry.delete(jobId);

    this.logger.withJobId(jobId).info({ status: job.status.toString() }, 'Job deleted');
  }
}
