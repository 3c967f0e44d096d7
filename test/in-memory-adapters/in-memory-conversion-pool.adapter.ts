import { Injectable } from '@nestjs/common';
import type {
  ConversionPoolPort,
  ConversionPoolStats,
  SubmitOptions,
} from '../../src/application/ports/output/conversion-pool.port';

/**
 * In-Memory Conversion Pool Adapter
 * Runs every submitted task straight away; capacity is set by the test
 */
@Injectable()
export class InMemoryConversionPoolAdapter implements ConversionPoolPort {
  private capacity = true;
  private completedJobs = 0;
  private failedJobs = 0;
  private readonly submittedJobIds: string[] = [];

  async submit<T>(jobId: string, task: () => Promise<T>, options: SubmitOptions<T> = {}): Promise<T> {
    this.submittedJobIds.push(jobId);

    try {
      const result = await task();
      if (options.isFailure?.(result)) {
        this.failedJobs++;
      } else {
        this.completedJobs++;
      }
      return result;
    } catch (error) {
      this.failedJobs++;
      throw error;
    }
  }

  hasCapacity(): boolean {
    return this.capacity;
  }

  getStats(): ConversionPoolStats {
    return {
      poolSize: 1,
      activeJobs: 0,
      idleSlots: 1,
      queuedJobs: this.capacity ? 0 : 3,
      maxQueuedJobs: 3,
      completedJobs: this.completedJobs,
      failedJobs: this.failedJobs,
      averageProcessingTimeMs: 0,
      isShuttingDown: false,
      isHealthy: this.capacity,
    };
  }

  async shutdown(): Promise<void> {
    this.capacity = false;
  }

  // Test helper methods

  setCapacity(capacity: boolean): void {
    this.capacity = capacity;
  }

  getSubmittedJobIds(): string[] {
    return [...this.submittedJobIds];
  }
}
