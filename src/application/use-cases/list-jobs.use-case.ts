import { Inject, Injectable } from '@nestjs/common';
import type { ListJobsPort } from '../ports/input/list-jobs.port';
import type { JobRegistryPort } from '../ports/output/job-registry.port';
import { JOB_REGISTRY_PORT } from '../ports/output/injection-tokens';
import type { ConversionJob } from '../../domain/entities/conversion-job.entity';

@Injectable()
export class ListJobsUseCase implements ListJobsPort {
  constructor(@Inject(JOB_REGISTRY_PORT) private readonly jobRegistry: JobRegistryPort) {}

  async execute(): Promise<ConversionJob[]> {
    return this.jobRegistry.list();
  }
}
