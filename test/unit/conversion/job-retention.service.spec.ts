import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { JobRetentionService } from '../../../src/conversion/services/job-retention.service';
import { ConversionErrorKind } from '../../../src/domain/errors/conversion.errors';
import { InMemoryJobRegistryAdapter } from '../../../src/infrastructure/adapters/persistence/in-memory-job-registry.adapter';
import {
  createMockArtifactStore,
  createMockWorkspaces,
  createPages,
  DEFAULT_OPTIONS,
} from '../helpers/mock-factories';
import { createTestConfigService, createTestLogger, type TestEnv } from '../helpers/test-config';

describe('JobRetentionService', () => {
  let registry: InMemoryJobRegistryAdapter;
  let artifactStore: ReturnType<typeof createMockArtifactStore>;
  let workspaces: ReturnType<typeof createMockWorkspaces>;

  const createService = (env: TestEnv) => {
    const configService = createTestConfigService(env);
    return new JobRetentionService(
      registry,
      artifactStore,
      workspaces,
      configService,
      createTestLogger(configService),
    );
  };

  const createFinishedJob = async (finishedAt: string, outcome: 'completed' | 'failed') => {
    vi.setSystemTime(new Date(finishedAt));
    const job = await registry.create({ sourceFilename: 'deck.pptx', options: DEFAULT_OPTIONS });
    return registry.update(job.jobId, (current) =>
      outcome === 'completed'
        ? current.transitionToConverting().transitionToRasterizing().transitionToCompleted(createPages(1))
        : current.transitionToFailed({ kind: ConversionErrorKind.CONVERSION_FAILED, message: 'bad' }),
    );
  };

  beforeEach(() => {
    vi.useFakeTimers();
    registry = new InMemoryJobRegistryAdapter(createTestLogger());
    artifactStore = createMockArtifactStore();
    workspaces = createMockWorkspaces();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should be disabled with a retention of 0', async () => {
    const service = createService({ JOB_RETENTION_MINUTES: '0' });
    await createFinishedJob('2024-01-01T00:00:00.000Z', 'completed');

    expect(service.isEnabled).toBe(false);
    expect(await service.sweep(new Date('2030-01-01T00:00:00.000Z'))).toBe(0);
    expect(await registry.count()).toBe(1);
  });

  it('should evict terminal jobs older than the retention period', async () => {
    const service = createService({ JOB_RETENTION_MINUTES: '10' });
    const old = await createFinishedJob('2024-01-01T00:00:00.000Z', 'completed');
    const oldFailed = await createFinishedJob('2024-01-01T00:01:00.000Z', 'failed');
    const recent = await createFinishedJob('2024-01-01T00:15:00.000Z', 'completed');

    const removed = await service.sweep(new Date('2024-01-01T00:20:00.000Z'));

    expect(removed).toBe(2);
    expect(artifactStore.remove.mock.calls).toEqual([[old.jobId], [oldFailed.jobId]]);
    expect(await registry.get(recent.jobId)).not.toBeNull();
    expect(await registry.get(old.jobId)).toBeNull();
  });

  it('should remove a workspace left behind by an expired job', async () => {
    const service = createService({ JOB_RETENTION_MINUTES: '1' });
    const leftover = await createFinishedJob('2024-01-01T00:00:00.000Z', 'failed');
    const clean = await createFinishedJob('2024-01-01T00:00:30.000Z', 'completed');
    workspaces.exists.mockImplementation(async (jobId: string) => jobId === leftover.jobId);

    expect(await service.sweep(new Date('2024-01-01T01:00:00.000Z'))).toBe(2);

    expect(workspaces.exists.mock.calls).toEqual([[leftover.jobId], [clean.jobId]]);
    expect(workspaces.release.mock.calls).toEqual([[leftover.jobId]]);
  });

  it('should keep jobs that are still running', async () => {
    const service = createService({ JOB_RETENTION_MINUTES: '1' });
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
    const job = await registry.create({ sourceFilename: 'deck.pptx', options: DEFAULT_OPTIONS });
    await registry.update(job.jobId, (current) => current.transitionToConverting());

    expect(await service.sweep(new Date('2024-01-02T00:00:00.000Z'))).toBe(0);
  });

  it('should keep a job whose images could not be removed', async () => {
    const service = createService({ JOB_RETENTION_MINUTES: '1' });
    const job = await createFinishedJob('2024-01-01T00:00:00.000Z', 'failed');
    artifactStore.remove.mockRejectedValueOnce(new Error('busy'));

    expect(await service.sweep(new Date('2024-01-01T01:00:00.000Z'))).toBe(0);
    expect(await registry.get(job.jobId)).not.toBeNull();
  });

  it('should sweep on the configured interval once started', async () => {
    const service = createService({ JOB_RETENTION_MINUTES: '1', RETENTION_SWEEP_INTERVAL_MS: '1000' });
    const sweep = vi.spyOn(service, 'sweep');

    service.onModuleInit();
    await vi.advanceTimersByTimeAsync(3500);
    service.onModuleDestroy();
    await vi.advanceTimersByTimeAsync(5000);

    expect(sweep).toHaveBeenCalledTimes(3);
  });

  it('should not schedule anything when disabled', async () => {
    const service = createService({ JOB_RETENTION_MINUTES: '0', RETENTION_SWEEP_INTERVAL_MS: '1000' });
    const sweep = vi.spyOn(service, 'sweep');

    service.start();
    await vi.advanceTimersByTimeAsync(5000);

    expect(sweep).not.toHaveBeenCalled();
  });
});
