import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import type {
  SubmitConversionCommand,
  SubmitConversionPort,
  SubmitConversionResult,
} from '../ports/input/submit-conversion.port';
import type { RunConversionPort } from '../ports/input/run-conversion.port';
import type { ConversionPoolPort } from '../ports/output/conversion-pool.port';
import type { EventPublisherPort } from '../ports/output/event-publisher.port';
import type { JobRegistryPort } from '../ports/output/job-registry.port';
import {
  CONVERSION_POOL_PORT,
  EVENT_PUBLISHER_PORT,
  JOB_REGISTRY_PORT,
} from '../ports/output/injection-tokens';
import { RunConversionUseCase } from './run-conversion.use-case';
import type { AppConfig } from '../../config/configuration';
import type { ConversionJob } from '../../domain/entities/conversion-job.entity';
import {
  QueueFullError,
  ResourceError,
  UploadRejectedError,
} from '../../domain/errors/conversion.errors';
import { JobQueuedEvent } from '../../domain/events/job-queued.event';
import {
  validateConversionOptions,
  type ConversionOptions,
} from '../../domain/value-objects/conversion-options.vo';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

/**
 * Submit Conversion Use Case
 * Validates an upload, registers the job and hands it to the conversion pool
 *
 * Nothing is registered when validation fails. Once the job exists, its
 * outcome is only ever reported through the job itself.
 */
@Injectable()
export class SubmitConversionUseCase implements SubmitConversionPort {
  private readonly logger: PinoLoggerService;
  private readonly uploadConfig: AppConfig['upload'];
  private readonly rasterizerConfig: AppConfig['rasterizer'];

  constructor(
    @Inject(JOB_REGISTRY_PORT) private readonly jobRegistry: JobRegistryPort,
    @Inject(CONVERSION_POOL_PORT) private readonly conversionPool: ConversionPoolPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    @Inject(RunConversionUseCase) private readonly runConversion: RunConversionPort,
    @Inject(ConfigService) configService: ConfigService<AppConfig, true>,
    @Inject(PinoLoggerService) logger: PinoLoggerService,
  ) {
    this.uploadConfig = configService.get('upload', { infer: true });
    this.rasterizerConfig = configService.get('rasterizer', { infer: true });
    this.logger = logger.forContext(SubmitConversionUseCase.name);
  }

  async execute(command: SubmitConversionCommand): Promise<SubmitConversionResult> {
    const sourceFilename = path.basename(command.filename.trim());
    const extension = this.checkUpload(sourceFilename, command.content);
    const options = this.resolveOptions(command.options);

    if (!this.conversionPool.hasCapacity()) {
      throw new QueueFullError(this.conversionPool.getStats().queuedJobs);
    }

    const job = await this.jobRegistry.create({ sourceFilename, options });
    const logger = this.logger.withJobId(job.jobId);
    const queuedAt = new Date();

    logger.info(
      { sourceFilename, sizeBytes: command.content.length, options },
      'Conversion job queued',
    );

    this.eventPublisher.publishAsync(
      new JobQueuedEvent({
        jobId: job.jobId,
        sourceFilename,
        sizeBytes: command.content.length,
        options,
      }),
    );

    const completion = this.conversionPool
      .submit(
        job.jobId,
        () =>
          this.runConversion.execute({
            jobId: job.jobId,
            content: command.content,
            extension,
            queuedAt,
          }),
        { isFailure: (finished) => finished.status.isFailed() },
      )
      .catch((error: unknown) => this.failUnscheduledJob(job, error));

    return { job, completion };
  }

  /**
   * Returns the normalized extension of an acceptable upload.
   */
  private checkUpload(filename: string, content: Buffer): string {
    if (filename.length === 0) {
      throw new UploadRejectedError('missing_file', 'No file was uploaded');
    }

    const extension = path.extname(filename).toLowerCase();
    if (!this.uploadConfig.allowedExtensions.includes(extension)) {
      throw new UploadRejectedError(
        'unsupported_extension',
        `Unsupported file type "${extension || filename}"; allowed: ${this.uploadConfig.allowedExtensions.join(', ')}`,
      );
    }

    if (content.length > this.uploadConfig.maxSizeBytes) {
      throw new UploadRejectedError(
        'too_large',
        `File exceeds the maximum upload size of ${this.uploadConfig.maxSizeBytes} bytes`,
      );
    }

    return extension;
  }

  private resolveOptions(requested: Partial<ConversionOptions> = {}): ConversionOptions {
    const options: ConversionOptions = {
      dpi: requested.dpi ?? this.rasterizerConfig.defaultDpi,
      format: requested.format ?? this.rasterizerConfig.defaultFormat,
      ...(requested.width !== undefined && { width: requested.width }),
      ...(requested.height !== undefined && { height: requested.height }),
    };

    const problems = validateConversionOptions(options, { maxDpi: this.rasterizerConfig.maxDpi });
    if (problems.length > 0) {
      throw new UploadRejectedError('invalid_options', problems.join('; '));
    }

    return options;
  }

  /**
   * The pool refused or dropped the job before it ran (shutdown).
   */
  private async failUnscheduledJob(job: ConversionJob, error: unknown): Promise<ConversionJob> {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.withJobId(job.jobId).error({ error: message }, 'Conversion job was not run');

    try {
      return await this.jobRegistry.update(job.jobId, (current) =>
        current.isTerminal()
          ? current
          : current.transitionToFailed(new ResourceError(message).toDetail()),
      );
    } catch (updateError) {
      this.logger.withJobId(job.jobId).error(
        { error: updateError instanceof Error ? updateError.message : String(updateError) },
        'Failed to record unscheduled job as failed',
      );
      return job;
    }
  }
}
