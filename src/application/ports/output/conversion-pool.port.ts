/**
 * Conversion Pool Statistics
 */
export interface ConversionPoolStats {
  poolSize: number;
  activeJobs: number;
  idleSlots: number;
  queuedJobs: number;
  maxQueuedJobs: number;
  completedJobs: number;
  failedJobs: number;
  averageProcessingTimeMs: number;
  isShuttingDown: boolean;
  isHealthy: boolean;
}

export interface SubmitOptions<T> {
  /**
   * Counts a resolved result as a failure in the pool statistics.
   */
  isFailure?: (result: T) => boolean;
}

/**
 * Conversion Pool Port (Driven Port)
 * Runs conversion tasks with bounded concurrency
 */
export interface ConversionPoolPort {
  /**
   * Run the task as soon as a slot is free. Resolves or rejects with the
   * task's own outcome.
   */
  submit<T>(jobId: string, task: () => Promise<T>, options?: SubmitOptions<T>): Promise<T>;

  /**
   * False once the waiting queue is full or the pool is shutting down.
   */
  hasCapacity(): boolean;

  getStats(): ConversionPoolStats;

  /**
   * Refuse new work, drop queued tasks and wait for running ones.
   */
  shutdown(): Promise<void>;
}
