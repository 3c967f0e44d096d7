import { Inject, Injectable, type OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  ConversionPoolPort,
  SubmitOptions,
} from '../application/ports/output/conversion-pool.port';
import type { AppConfig } from '../config/configuration';
import { QueueFullError } from '../domain/errors/conversion.errors';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import type { PoolStats, SlotStats } from './interfaces/pool-stats.interface';

/**
 * One unit of concurrency. A slot runs at most one job at a time.
 */
interface Slot {
  slotId: number;
  isActive: boolean;
  currentJobId?: string;
  jobsCompleted: number;
  jobsFailed: number;
  lastActivityAt: Date;
}

/**
 * Job waiting for a free slot. `start` runs the task and settles the
 * caller's promise; `reject` is used only when the pool shuts down first.
 */
interface QueuedJob {
  jobId: string;
  start: (slot: Slot) => Promise<void>;
  reject: (error: Error) => void;
  queuedAt: Date;
}

export const POOL_SHUTTING_DOWN_MESSAGE = 'Conversion pool is shutting down';

/**
 * Conversion Pool Service
 *
 * Runs conversion jobs with bounded concurrency. The heavy lifting happens
 * in external processes, so a slot is an async task on the event loop.
 *
 * ## Scheduling:
 * - `WORKER_POOL_SIZE` slots run jobs at the same time
 * - Further jobs wait in a FIFO queue of at most `MAX_QUEUED_JOBS`
 * - Jobs finish in whatever order their tools finish
 *
 * ## Shutdown:
 * Queued jobs are rejected; running jobs are awaited so their workspaces
 * are released before the process exits.
 */
@Injectable()
export class ConversionPoolService implements ConversionPoolPort, OnModuleDestroy {
  private readonly slots: Slot[];
  private queue: QueuedJob[] = [];
  private readonly running = new Set<Promise<void>>();
  private isShuttingDown = false;

  private readonly poolSize: number;
  private readonly maxQueuedJobs: number;

  private completedJobsCount = 0;
  private failedJobsCount = 0;
  private totalProcessingTimeMs = 0;

  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(ConfigService) configService: ConfigService<AppConfig, true>,
    @Inject(PinoLoggerService) logger: PinoLoggerService,
  ) {
    const poolConfig = configService.get('conversionPool', { infer: true });
    this.poolSize = poolConfig.poolSize;
    this.maxQueuedJobs = poolConfig.maxQueuedJobs;

    this.slots = Array.from({ length: this.poolSize }, (_, slotId) => ({
      slotId,
      isActive: false,
      jobsCompleted: 0,
      jobsFailed: 0,
      lastActivityAt: new Date(),
    }));

    this.logger = logger.forContext(ConversionPoolService.name);
  }

  async onModuleDestroy(): Promise<void> {
    await this.shutdown();
  }

  /**
   * Submit a job to the pool.
   *
   * Runs immediately when a slot is idle, otherwise joins the queue.
   * Throws QueueFullError when the queue is at `MAX_QUEUED_JOBS`; callers
   * that want to answer 503 up front check `hasCapacity()` first.
   */
  submit<T>(jobId: string, task: () => Promise<T>, options: SubmitOptions<T> = {}): Promise<T> {
    if (this.isShuttingDown) {
      return Promise.reject(new Error(POOL_SHUTTING_DOWN_MESSAGE));
    }

    const idleSlot = this.getIdleSlot();
    if (!idleSlot && this.queue.length >= this.maxQueuedJobs) {
      return Promise.reject(new QueueFullError(this.queue.length));
    }

    return new Promise<T>((resolve, reject) => {
      const queuedJob: QueuedJob = {
        jobId,
        queuedAt: new Date(),
        reject,
        start: async (slot) => {
          const startedAt = Date.now();
          let failed = false;

          try {
            const result = await task();
            failed = options.isFailure?.(result) ?? false;
            resolve(result);
          } catch (error) {
            failed = true;
            reject(error);
          } finally {
            this.finishJob(slot, jobId, failed, Date.now() - startedAt);
          }
        },
      };

      if (idleSlot) {
        this.dispatch(idleSlot, queuedJob);
      } else {
        this.queue.push(queuedJob);
        this.logger.debug({ jobId, queueLength: this.queue.length }, 'Job queued');
      }
    });
  }

  hasCapacity(): boolean {
    if (this.isShuttingDown) return false;
    return this.getIdleSlotCount() > 0 || this.queue.length < this.maxQueuedJobs;
  }

  getIdleSlotCount(): number {
    return this.slots.filter((slot) => !slot.isActive).length;
  }

  getActiveJobCount(): number {
    return this.poolSize - this.getIdleSlotCount();
  }

  getQueueLength(): number {
    return this.queue.length;
  }

  getStats(): PoolStats {
    const finished = this.completedJobsCount + this.failedJobsCount;

    return {
      poolSize: this.poolSize,
      activeJobs: this.getActiveJobCount(),
      idleSlots: this.getIdleSlotCount(),
      queuedJobs: this.queue.length,
      maxQueuedJobs: this.maxQueuedJobs,
      completedJobs: this.completedJobsCount,
      failedJobs: this.failedJobsCount,
      averageProcessingTimeMs: finished > 0 ? this.totalProcessingTimeMs / finished : 0,
      isShuttingDown: this.isShuttingDown,
      isHealthy: this.hasCapacity(),
    };
  }

  getSlotStats(): SlotStats[] {
    return this.slots.map((slot) => ({ ...slot }));
  }

  async shutdown(): Promise<void> {
    if (this.isShuttingDown) return;

    this.isShuttingDown = true;
    this.logger.info(
      { activeJobs: this.getActiveJobCount(), queuedJobs: this.queue.length },
      'Shutting down conversion pool',
    );

    // Reject all queued jobs
    const queued = this.queue;
    this.queue = [];
    for (const job of queued) {
      job.reject(new Error(POOL_SHUTTING_DOWN_MESSAGE));
    }

    await Promise.all(this.running);
    this.logger.info('Conversion pool shut down');
  }

  private getIdleSlot(): Slot | null {
    return this.slots.find((slot) => !slot.isActive) ?? null;
  }

  private dispatch(slot: Slot, queuedJob: QueuedJob): void {
    slot.isActive = true;
    slot.currentJobId = queuedJob.jobId;
    slot.lastActivityAt = new Date();

    this.logger.debug(
      {
        jobId: queuedJob.jobId,
        slotId: slot.slotId,
        waitedMs: Date.now() - queuedJob.queuedAt.getTime(),
      },
      'Job dispatched to slot',
    );

    // start() settles the caller's promise itself and never rejects
    const run = queuedJob.start(slot).finally(() => {
      this.running.delete(run);
    });
    this.running.add(run);
  }

  private finishJob(slot: Slot, jobId: string, failed: boolean, durationMs: number): void {
    slot.isActive = false;
    slot.currentJobId = undefined;
    slot.lastActivityAt = new Date();
    this.totalProcessingTimeMs += durationMs;

    if (failed) {
      slot.jobsFailed++;
      this.failedJobsCount++;
    } else {
      slot.jobsCompleted++;
      this.completedJobsCount++;
    }

    this.logger.info(
      {
        jobId,
        slotId: slot.slotId,
        durationMs,
        outcome: failed ? 'failed' : 'completed',
        queuedJobs: this.queue.length,
      },
      'Job left conversion slot',
    );

    this.processNextInQueue();
  }

  /**
   * Dequeue in FIFO order onto the slot that just became idle.
   */
  private processNextInQueue(): void {
    if (this.isShuttingDown) return;

    const idleSlot = this.getIdleSlot();
    if (!idleSlot) return;

    const next = this.queue.shift();
    if (next) {
      this.dispatch(idleSlot, next);
    }
  }
}
