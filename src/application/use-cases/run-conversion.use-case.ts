import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  RunConversionCommand,
  RunConversionPort,
} from '../ports/input/run-conversion.port';
import type { ArtifactStorePort } from '../ports/output/artifact-store.port';
import type { DocumentConverterPort } from '../ports/output/document-converter.port';
import type { EventPublisherPort } from '../ports/output/event-publisher.port';
import type { JobRegistryPort } from '../ports/output/job-registry.port';
import type { PageRasterizerPort } from '../ports/output/page-rasterizer.port';
import type { WorkspacePort } from '../ports/output/workspace.port';
import {
  ARTIFACT_STORE_PORT,
  DOCUMENT_CONVERTER_PORT,
  EVENT_PUBLISHER_PORT,
  JOB_REGISTRY_PORT,
  PAGE_RASTERIZER_PORT,
  WORKSPACE_PORT,
} from '../ports/output/injection-tokens';
import type { AppConfig } from '../../config/configuration';
import type { ConversionJob } from '../../domain/entities/conversion-job.entity';
import { toJobErrorDetail } from '../../domain/errors/conversion.errors';
import { JobCompletedEvent } from '../../domain/events/job-completed.event';
import { JobFailedEvent } from '../../domain/events/job-failed.event';
import { JobStartedEvent } from '../../domain/events/job-started.event';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

/**
 * Run Conversion Use Case
 * Drives one job through workspace, converter, rasterizer and artifact store
 *
 * Every failure is caught here and recorded on the job as a terminal
 * `failed` state. The workspace is released exactly once, whatever happens.
 */
@Injectable()
export class RunConversionUseCase implements RunConversionPort {
  private readonly logger: PinoLoggerService;
  private readonly converterTimeoutMs: number;
  private readonly rasterizerTimeoutMs: number;

  constructor(
    @Inject(JOB_REGISTRY_PORT) private readonly jobRegistry: JobRegistryPort,
    @Inject(WORKSPACE_PORT) private readonly workspaces: WorkspacePort,
    @Inject(DOCUMENT_CONVERTER_PORT) private readonly converter: DocumentConverterPort,
    @Inject(PAGE_RASTERIZER_PORT) private readonly rasterizer: PageRasterizerPort,
    @Inject(ARTIFACT_STORE_PORT) private readonly artifactStore: ArtifactStorePort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    @Inject(ConfigService) configService: ConfigService<AppConfig, true>,
    @Inject(PinoLoggerService) logger: PinoLoggerService,
  ) {
    this.converterTimeoutMs = configService.get('converter.timeoutMs', { infer: true });
    this.rasterizerTimeoutMs = configService.get('rasterizer.timeoutMs', { infer: true });
    this.logger = logger.forContext(RunConversionUseCase.name);
  }

  async execute(command: RunConversionCommand): Promise<ConversionJob> {
    const { jobId } = command;
    const logger = this.logger.withJobId(jobId);
    const startedAt = Date.now();

    try {
      const workspace = await this.workspaces.acquire(jobId);
      this.eventPublisher.publishAsync(
        new JobStartedEvent({
          jobId,
          workspacePath: workspace.path,
          waitedMs: command.queuedAt ? startedAt - command.queuedAt.getTime() : 0,
        }),
      );

      const sourcePath = await this.workspaces.writeSource(
        workspace,
        command.extension,
        command.content,
      );

      // Step 1: presentation -> PDF
      const converting = await this.jobRegistry.update(jobId, (job) =>
        job.transitionToConverting(),
      );
      logger.info({ sourcePath }, 'Converting document');
      const pdfPath = await this.converter.convert(sourcePath, workspace, this.converterTimeoutMs);

      // Step 2: PDF -> page images
      await this.jobRegistry.update(jobId, (job) => job.transitionToRasterizing());
      logger.info({ pdfPath }, 'Rasterizing document');
      const rendered = await this.rasterizer.rasterize(
        pdfPath,
        workspace,
        converting.options,
        this.rasterizerTimeoutMs,
        (pagesRendered) => this.recordProgress(jobId, pagesRendered),
      );

      // Step 3: move images out before the workspace goes away
      const pages = await this.artifactStore.persist(jobId, rendered);
      const completed = await this.jobRegistry.update(jobId, (job) =>
        job.transitionToCompleted(pages),
      );

      const durationMs = Date.now() - startedAt;
      logger.info({ pageCount: completed.pageCount, durationMs }, 'Conversion completed');

      this.eventPublisher.publishAsync(
        new JobCompletedEvent({
          jobId,
          pageCount: completed.pageCount,
          totalBytes: pages.reduce((sum, page) => sum + page.sizeBytes, 0),
          durationMs,
        }),
      );

      return completed;
    } catch (error) {
      return this.recordFailure(jobId, error, startedAt);
    } finally {
      await this.workspaces.release(jobId);
    }
  }

  private recordProgress(jobId: string, pagesRendered: number): void {
    this.jobRegistry
      .update(jobId, (job) => job.recordPagesRendered(pagesRendered))
      .then(() => {
        this.logger.withJobId(jobId).debug({ pagesRendered }, 'Rasterization progress');
      })
      .catch((error: unknown) => {
        this.logger.withJobId(jobId).warn(
          { pagesRendered, error: error instanceof Error ? error.message : String(error) },
          'Failed to record rasterization progress',
        );
      });
  }

  private async recordFailure(
    jobId: string,
    error: unknown,
    startedAt: number,
  ): Promise<ConversionJob> {
    const logger = this.logger.withJobId(jobId);
    const detail = toJobErrorDetail(error);
    let failedDuring = 'unknown';

    logger.error(
      {
        kind: detail.kind,
        error: detail.message,
        tool: detail.tool,
        exitCode: detail.exitCode,
        stderr: detail.stderr,
        stack: error instanceof Error ? error.stack : undefined,
      },
      'Conversion failed',
    );

    // Images persisted before the failure must not outlive the job's pages
    try {
      await this.artifactStore.remove(jobId);
    } catch (removeError) {
      logger.warn(
        {
          error: removeError instanceof Error ? removeError.message : String(removeError),
        },
        'Failed to remove partial artifacts',
      );
    }

    const failed = await this.jobRegistry.update(jobId, (job) => {
      failedDuring = job.status.toString();
      return job.isTerminal() ? job : job.transitionToFailed(detail);
    });

    this.eventPublisher.publishAsync(
      new JobFailedEvent({
        jobId,
        kind: detail.kind,
        errorMessage: detail.message,
        failedDuring,
        durationMs: Date.now() - startedAt,
      }),
    );

    return failed;
  }
}
