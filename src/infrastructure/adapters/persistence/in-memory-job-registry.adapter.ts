import { Inject, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import type {
  CreateJobProps,
  JobMutation,
  JobRegistryPort,
} from '../../../application/ports/output/job-registry.port';
import { ConversionJob } from '../../../domain/entities/conversion-job.entity';
import { JobNotFoundError } from '../../../domain/errors/conversion.errors';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * In-Memory Job Registry Adapter
 * Implements JobRegistryPort with a Map of immutable job snapshots
 *
 * Jobs live as long as the process does. Every mutation runs synchronously
 * between two awaits, so concurrent pool slots never interleave inside one.
 */
@Injectable()
export class InMemoryJobRegistryAdapter implements JobRegistryPort {
  private readonly jobs = new Map<string, ConversionJob>();
  private readonly logger: PinoLoggerService;

  constructor(@Inject(PinoLoggerService) logger: PinoLoggerService) {
    this.logger = logger.forContext(InMemoryJobRegistryAdapter.name);
  }

  async create(props: CreateJobProps): Promise<ConversionJob> {
    const job = ConversionJob.create({
      jobId: this.allocateId(),
      sourceFilename: props.sourceFilename,
      options: props.options,
    });

    this.jobs.set(job.jobId, job);
    this.logger.debug({ jobId: job.jobId, totalJobs: this.jobs.size }, 'Registered job');

    return job;
  }

  async get(jobId: string): Promise<ConversionJob | null> {
    return this.jobs.get(jobId) ?? null;
  }

  async require(jobId: string): Promise<ConversionJob> {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  async update(jobId: string, mutation: JobMutation): Promise<ConversionJob> {
    const current = this.jobs.get(jobId);
    if (!current) {
      throw new JobNotFoundError(jobId);
    }

    // The mutation may throw (e.g. an invalid transition); the stored snapshot is then untouched
    const next = mutation(current);
    this.jobs.set(jobId, next);

    this.logger.debug(
      { jobId, from: current.status.toString(), to: next.status.toString() },
      'Updated job',
    );

    return next;
  }

  async list(): Promise<ConversionJob[]> {
    return [...this.jobs.values()]
      .reverse()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async delete(jobId: string): Promise<boolean> {
    const deleted = this.jobs.delete(jobId);
    if (deleted) {
      this.logger.debug({ jobId, totalJobs: this.jobs.size }, 'Removed job');
    }
    return deleted;
  }

  async findTerminalBefore(cutoff: Date): Promise<ConversionJob[]> {
    return [...this.jobs.values()].filter(
      (job) =>
        job.isTerminal() &&
        job.completedAt !== undefined &&
        job.completedAt.getTime() < cutoff.getTime(),
    );
  }

  async count(): Promise<number> {
    return this.jobs.size;
  }

  private allocateId(): string {
    let jobId = uuidv4();
    while (this.jobs.has(jobId)) {
      jobId = uuidv4();
    }
    return jobId;
  }
}
