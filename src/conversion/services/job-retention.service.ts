import {
  Inject,
  Injectable,
  type OnModuleDestroy,
  type OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { ArtifactStorePort } from '../../application/ports/output/artifact-store.port';
import type { JobRegistryPort } from '../../application/ports/output/job-registry.port';
import type { WorkspacePort } from '../../application/ports/output/workspace.port';
import {
  ARTIFACT_STORE_PORT,
  JOB_REGISTRY_PORT,
  WORKSPACE_PORT,
} from '../../application/ports/output/injection-tokens';
import type { AppConfig } from '../../config/configuration';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

/**
 * Evicts finished jobs and their images once they are older than
 * JOB_RETENTION_MINUTES. With a retention of 0 nothing is ever evicted.
 * A workspace still on disk for an evicted job is removed with it.
 */
@Injectable()
export class JobRetentionService implements OnModuleInit, OnModuleDestroy {
  private readonly retentionMs: number;
  private readonly sweepIntervalMs: number;
  private sweepTimer: NodeJS.Timeout | null = null;
  private isRunning = false;
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(JOB_REGISTRY_PORT) private readonly jobRegistry: JobRegistryPort,
    @Inject(ARTIFACT_STORE_PORT) private readonly artifactStore: ArtifactStorePort,
    @Inject(WORKSPACE_PORT) private readonly workspaces: WorkspacePort,
    @Inject(ConfigService) configService: ConfigService<AppConfig, true>,
    @Inject(PinoLoggerService) logger: PinoLoggerService,
  ) {
    const retentionConfig = configService.get('retention', { infer: true });
    this.retentionMs = retentionConfig.retentionMinutes * 60_000;
    this.sweepIntervalMs = retentionConfig.sweepIntervalMs;
    this.logger = logger.forContext(JobRetentionService.name);
  }

  get isEnabled(): boolean {
    return this.retentionMs > 0;
  }

  onModuleInit(): void {
    this.start();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  start(): void {
    if (this.isRunning || !this.isEnabled) return;

    this.isRunning = true;
    this.logger.info(
      { retentionMs: this.retentionMs, sweepIntervalMs: this.sweepIntervalMs },
      'Starting job retention sweep',
    );
    this.scheduleNextSweep();
  }

  stop(): void {
    this.isRunning = false;
    if (this.sweepTimer) {
      clearTimeout(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /**
   * Removes every terminal job that finished more than the retention period
   * before `now`. Returns how many were removed.
   */
  async sweep(now: Date = new Date()): Promise<number> {
    if (!this.isEnabled) return 0;

    const cutoff = new Date(now.getTime() - this.retentionMs);
    const expired = await this.jobRegistry.findTerminalBefore(cutoff);
    let removed = 0;

    for (const job of expired) {
      try {
        await this.artifactStore.remove(job.jobId);
        if (await this.workspaces.exists(job.jobId)) {
          this.logger.warn({ jobId: job.jobId }, 'Removing leftover workspace of expired job');
          await this.workspaces.release(job.jobId);
        }
        await this.jobRegistry.delete(job.jobId);
        removed++;
      } catch (error) {
        this.logger.error(
          {
            jobId: job.jobId,
            error: error instanceof Error ? error.message : String(error),
          },
          'Failed to evict expired job',
        );
      }
    }

    if (removed > 0) {
      this.logger.info({ removed, cutoff: cutoff.toISOString() }, 'Evicted expired jobs');
    }

    return removed;
  }

  private scheduleNextSweep(): void {
    if (!this.isRunning) return;

    this.sweepTimer = setTimeout(() => {
      this.sweep()
        .catch((error: unknown) => {
          this.logger.error(
            { error: error instanceof Error ? error.message : String(error) },
            'Retention sweep failed',
          );
        })
        .finally(() => this.scheduleNextSweep());
    }, this.sweepIntervalMs);
    this.sweepTimer.unref();
  }
}
