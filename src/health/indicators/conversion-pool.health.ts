import { Inject, Injectable } from '@nestjs/common';
import {
  HealthIndicator,
  type HealthIndicatorResult,
  HealthCheckError,
} from '@nestjs/terminus';
import { ConversionPoolService } from '../../conversion-pool/conversion-pool.service';

@Injectable()
export class ConversionPoolHealthIndicator extends HealthIndicator {
  constructor(@Inject(ConversionPoolService) private readonly conversionPool: ConversionPoolService) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const stats = this.conversionPool.getStats();

    const details = {
      poolSize: stats.poolSize,
      activeJobs: stats.activeJobs,
      idleSlots: stats.idleSlots,
      queuedJobs: stats.queuedJobs,
      maxQueuedJobs: stats.maxQueuedJobs,
      completedJobs: stats.completedJobs,
      failedJobs: stats.failedJobs,
      averageProcessingTimeMs: Math.round(stats.averageProcessingTimeMs),
      slots: this.conversionPool.getSlotStats().map((slot) => ({
        slotId: slot.slotId,
        isActive: slot.isActive,
        currentJobId: slot.currentJobId ?? null,
        jobsCompleted: slot.jobsCompleted,
        jobsFailed: slot.jobsFailed,
        lastActivityAt: slot.lastActivityAt.toISOString(),
      })),
    };

    if (stats.isHealthy) {
      return this.getStatus(key, true, details);
    }

    throw new HealthCheckError(
      stats.isShuttingDown
        ? 'Conversion pool is shutting down'
        : 'Conversion pool is unhealthy - queue is full',
      this.getStatus(key, false, details),
    );
  }
}
