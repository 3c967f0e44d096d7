import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ConversionPoolService,
  POOL_SHUTTING_DOWN_MESSAGE,
} from '../../../src/conversion-pool/conversion-pool.service';
import { QueueFullError } from '../../../src/domain/errors/conversion.errors';
import { createDeferred, flushPromises } from '../helpers/mock-factories';
import { createTestConfigService, createTestLogger } from '../helpers/test-config';

describe('ConversionPoolService', () => {
  let pool: ConversionPoolService;

  const createPool = (poolSize: number, maxQueuedJobs: number) => {
    const configService = createTestConfigService({
      WORKER_POOL_SIZE: String(poolSize),
      MAX_QUEUED_JOBS: String(maxQueuedJobs),
    });
    return new ConversionPoolService(configService, createTestLogger(configService));
  };

  beforeEach(() => {
    pool = createPool(2, 2);
  });

  afterEach(async () => {
    await pool.shutdown();
  });

  describe('Scheduling', () => {
    it('should start jobs immediately while slots are idle', async () => {
      const first = createDeferred<string>();
      const second = createDeferred<string>();
      const started: string[] = [];

      const results = [
        pool.submit('job-1', () => {
          started.push('job-1');
          return first.promise;
        }),
        pool.submit('job-2', () => {
          started.push('job-2');
          return second.promise;
        }),
      ];

      expect(started).toEqual(['job-1', 'job-2']);
      expect(pool.getActiveJobCount()).toBe(2);
      expect(pool.getQueueLength()).toBe(0);

      first.resolve('a');
      second.resolve('b');
      await expect(Promise.all(results)).resolves.toEqual(['a', 'b']);
    });

    it('should queue beyond the pool size and dispatch in FIFO order', async () => {
      const blockers = [createDeferred<void>(), createDeferred<void>(), createDeferred<void>()];
      const started: string[] = [];

      const submit = (jobId: string, wait?: Promise<void>) =>
        pool.submit(jobId, async () => {
          started.push(jobId);
          await wait;
        });

      const jobs = [
        submit('job-1', blockers[0].promise),
        submit('job-2', blockers[1].promise),
        submit('job-3', blockers[2].promise),
        submit('job-4'),
      ];

      expect(pool.getQueueLength()).toBe(2);
      expect(started).toEqual(['job-1', 'job-2']);

      blockers[1].resolve();
      await flushPromises();
      expect(started).toEqual(['job-1', 'job-2', 'job-3']);
      expect(pool.getQueueLength()).toBe(1);

      blockers[0].resolve();
      await flushPromises();
      expect(started).toEqual(['job-1', 'job-2', 'job-3', 'job-4']);

      blockers[2].resolve();
      await Promise.all(jobs);
      expect(pool.getStats().completedJobs).toBe(4);
    });

    it('should never run more jobs than slots', async () => {
      let running = 0;
      let peak = 0;

      await Promise.all(
        ['a', 'b', 'c', 'd'].map((jobId) =>
          pool.submit(jobId, async () => {
            running++;
            peak = Math.max(peak, running);
            await flushPromises();
            running--;
          }),
        ),
      );

      expect(peak).toBe(2);
    });
  });

  describe('Backpressure', () => {
    it('should refuse submissions once the queue is full', async () => {
      pool = createPool(1, 1);
      const blocker = createDeferred<void>();

      const running = pool.submit('job-1', () => blocker.promise);
      const queued = pool.submit('job-2', async () => undefined);

      expect(pool.hasCapacity()).toBe(false);
      await expect(pool.submit('job-3', async () => undefined)).rejects.toBeInstanceOf(
        QueueFullError,
      );

      blocker.resolve();
      await Promise.all([running, queued]);
      expect(pool.hasCapacity()).toBe(true);
    });

    it('should run without a queue when MAX_QUEUED_JOBS is 0', async () => {
      pool = createPool(1, 0);
      const blocker = createDeferred<void>();

      const running = pool.submit('job-1', () => blocker.promise);

      expect(pool.hasCapacity()).toBe(false);
      await expect(pool.submit('job-2', async () => undefined)).rejects.toThrow(
        'Conversion queue is full (0 jobs waiting)',
      );

      blocker.resolve();
      await running;
    });
  });

  describe('Outcomes', () => {
    it('should pass a task rejection to the caller and count it as failed', async () => {
      await expect(
        pool.submit('job-1', async () => {
          throw new Error('tool crashed');
        }),
      ).rejects.toThrow('tool crashed');

      expect(pool.getStats().failedJobs).toBe(1);
      expect(pool.getSlotStats()[0]).toMatchObject({ slotId: 0, jobsFailed: 1, jobsCompleted: 0 });
    });

    it('should count a resolved result as failed when isFailure says so', async () => {
      await pool.submit('job-1', async () => 'failed', {
        isFailure: (status) => status === 'failed',
      });
      await pool.submit('job-2', async () => 'completed', {
        isFailure: (status) => status === 'failed',
      });

      const stats = pool.getStats();
      expect(stats.failedJobs).toBe(1);
      expect(stats.completedJobs).toBe(1);
      expect(pool.getSlotStats()[0]).toMatchObject({ jobsFailed: 1, jobsCompleted: 1 });
    });

    it('should free the slot after a failure', async () => {
      pool = createPool(1, 0);

      await expect(
        pool.submit('job-1', async () => {
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');

      await expect(pool.submit('job-2', async () => 'ok')).resolves.toBe('ok');
    });
  });

  describe('Stats', () => {
    it('should report an idle pool', () => {
      expect(pool.getStats()).toEqual({
        poolSize: 2,
        activeJobs: 0,
        idleSlots: 2,
        queuedJobs: 0,
        maxQueuedJobs: 2,
        completedJobs: 0,
        failedJobs: 0,
        averageProcessingTimeMs: 0,
        isShuttingDown: false,
        isHealthy: true,
      });
    });

    it('should report per-slot activity', async () => {
      const blocker = createDeferred<void>();
      const running = pool.submit('job-1', () => blocker.promise);

      const [busy, idle] = pool.getSlotStats();
      expect(busy).toMatchObject({ slotId: 0, isActive: true, currentJobId: 'job-1' });
      expect(idle).toMatchObject({ slotId: 1, isActive: false });

      blocker.resolve();
      await running;
      expect(pool.getSlotStats()[0]).toMatchObject({ isActive: false, jobsCompleted: 1 });
    });
  });

  describe('Shutdown', () => {
    it('should reject queued jobs and wait for running ones', async () => {
      pool = createPool(1, 2);
      const blocker = createDeferred<string>();
      let queuedStarted = false;

      const running = pool.submit('job-1', () => blocker.promise);
      const queued = pool.submit('job-2', async () => {
        queuedStarted = true;
      });

      const shutdown = pool.shutdown();
      await expect(queued).rejects.toThrow(POOL_SHUTTING_DOWN_MESSAGE);

      blocker.resolve('done');
      await shutdown;

      await expect(running).resolves.toBe('done');
      expect(queuedStarted).toBe(false);
      expect(pool.getStats().isShuttingDown).toBe(true);
      expect(pool.hasCapacity()).toBe(false);
    });

    it('should refuse new work after shutdown', async () => {
      await pool.shutdown();

      await expect(pool.submit('job-1', async () => undefined)).rejects.toThrow(
        POOL_SHUTTING_DOWN_MESSAGE,
      );
    });
  });
});
