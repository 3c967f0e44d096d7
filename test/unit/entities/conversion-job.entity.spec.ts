import { describe, it, expect } from 'vitest';
import { ConversionJob } from '../../../src/domain/entities/conversion-job.entity';
import {
  ConversionErrorKind,
  ConversionTimeoutError,
  InvalidJobTransitionError,
} from '../../../src/domain/errors/conversion.errors';
import { JobStatus } from '../../../src/domain/value-objects/job-status.vo';
import { createPages, createQueuedJob } from '../helpers/mock-factories';

/**
 * ConversionJob lifecycle and immutability
 * Every transition returns a new instance and leaves the previous snapshot intact
 */
describe('ConversionJob', () => {
  describe('create', () => {
    it('should start queued with no pages', () => {
      const job = createQueuedJob();

      expect(job.status.value).toBe(JobStatus.QUEUED);
      expect(job.status.progress).toBe(0);
      expect(job.pages).toEqual([]);
      expect(job.pageCount).toBe(0);
      expect(job.completedAt).toBeUndefined();
      expect(job.createdAt).toEqual(job.updatedAt);
    });

    it('should reject a blank job id', () => {
      expect(() => createQueuedJob({ jobId: '  ' })).toThrow('Job ID is required');
    });

    it('should reject a blank filename', () => {
      expect(() => createQueuedJob({ sourceFilename: '' })).toThrow('Source filename is required');
    });

    it('should reject a non-positive dpi', () => {
      expect(() => createQueuedJob({ options: { dpi: 0, format: 'png' } })).toThrow(
        'DPI must be a positive integer',
      );
    });

    it('should return a frozen object', () => {
      expect(Object.isFrozen(createQueuedJob())).toBe(true);
    });
  });

  describe('transitions', () => {
    it('should walk queued -> converting -> rasterizing -> completed', () => {
      const queued = createQueuedJob();
      const converting = queued.transitionToConverting();
      const rasterizing = converting.transitionToRasterizing();
      const completed = rasterizing.transitionToCompleted(createPages(3));

      expect(converting.status.value).toBe(JobStatus.CONVERTING);
      expect(converting.status.progress).toBe(10);
      expect(rasterizing.status.value).toBe(JobStatus.RASTERIZING);
      expect(rasterizing.status.progress).toBe(50);
      expect(completed.status.value).toBe(JobStatus.COMPLETED);
      expect(completed.pageCount).toBe(3);
      expect(completed.completedAt).toBeInstanceOf(Date);
      expect(completed.isTerminal()).toBe(true);
    });

    it('should not mutate the previous snapshot', () => {
      const queued = createQueuedJob();
      const converting = queued.transitionToConverting();

      expect(converting).not.toBe(queued);
      expect(queued.status.value).toBe(JobStatus.QUEUED);
      expect(queued.updatedAt.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    });

    it('should refuse to skip a stage', () => {
      const queued = createQueuedJob();

      expect(() => queued.transitionToCompleted(createPages(1))).toThrow(InvalidJobTransitionError);
      expect(() => queued.transitionToRasterizing()).toThrow(
        'Invalid status transition from queued to rasterizing',
      );
    });

    it('should refuse to complete without pages', () => {
      const rasterizing = createQueuedJob().transitionToConverting().transitionToRasterizing();

      expect(() => rasterizing.transitionToCompleted([])).toThrow(
        'Cannot mark job as completed without page images',
      );
    });

    it('should refuse to complete with a gap in page indices', () => {
      const rasterizing = createQueuedJob().transitionToConverting().transitionToRasterizing();
      const [first, , third] = createPages(3);

      expect(() => rasterizing.transitionToCompleted([first, third])).toThrow(
        'Cannot mark job as completed: page indices are not contiguous from 1',
      );
    });

    it('should fail from any non-terminal state', () => {
      const detail = new ConversionTimeoutError('converter', 1000).toDetail();

      for (const job of [
        createQueuedJob(),
        createQueuedJob().transitionToConverting(),
        createQueuedJob().transitionToConverting().transitionToRasterizing(),
      ]) {
        const failed = job.transitionToFailed(detail);
        expect(failed.status.value).toBe(JobStatus.FAILED);
        expect(failed.error).toEqual({
          kind: ConversionErrorKind.CONVERSION_TIMEOUT,
          message: 'converter did not finish within 1000ms and was terminated',
          tool: 'converter',
        });
        expect(failed.pages).toEqual([]);
        expect(failed.completedAt).toBeInstanceOf(Date);
      }
    });

    it('should never leave a terminal state', () => {
      const completed = createQueuedJob()
        .transitionToConverting()
        .transitionToRasterizing()
        .transitionToCompleted(createPages(1));
      const failed = createQueuedJob().transitionToFailed({
        kind: ConversionErrorKind.CONVERSION_FAILED,
        message: 'boom',
      });

      expect(() =>
        completed.transitionToFailed({ kind: ConversionErrorKind.CONVERSION_FAILED, message: 'x' }),
      ).toThrow('Invalid status transition from completed to failed');
      expect(() => failed.transitionToConverting()).toThrow(
        'Invalid status transition from failed to converting',
      );
    });
  });

  describe('recordPagesRendered', () => {
    const rasterizing = () => createQueuedJob().transitionToConverting().transitionToRasterizing();

    it('should count pages written while rasterizing', () => {
      const job = rasterizing().recordPagesRendered(2).recordPagesRendered(5);

      expect(job.pagesRendered).toBe(5);
      expect(job.status.value).toBe(JobStatus.RASTERIZING);
      expect(job.toView('http://test.local').pagesRendered).toBe(5);
    });

    it('should never lower the count', () => {
      const job = rasterizing().recordPagesRendered(4).recordPagesRendered(3);

      expect(job.pagesRendered).toBe(4);
    });

    it('should ignore reports outside rasterizing', () => {
      const queued = createQueuedJob();
      const completed = rasterizing().transitionToCompleted(createPages(3));

      expect(queued.recordPagesRendered(2).pagesRendered).toBe(0);
      expect(completed.recordPagesRendered(7).pagesRendered).toBe(3);
    });

    it('should settle on the page count when completed', () => {
      const job = rasterizing().recordPagesRendered(1).transitionToCompleted(createPages(2));

      expect(job.pagesRendered).toBe(2);
    });
  });

  describe('toView', () => {
    it('should describe a queued job with empty images and null error', () => {
      const view = createQueuedJob().toView('http://test.local');

      expect(view).toEqual({
        jobId: 'job-123',
        filename: 'deck.pptx',
        status: 'queued',
        progress: 0,
        pagesRendered: 0,
        options: { dpi: 150, format: 'png' },
        createdAt: '2024-01-01T00:00:00.000Z',
        updatedAt: '2024-01-01T00:00:00.000Z',
        completedAt: null,
        pageCount: 0,
        images: [],
        error: null,
      });
    });

    it('should build image urls from the base url', () => {
      const completed = createQueuedJob()
        .transitionToConverting()
        .transitionToRasterizing()
        .transitionToCompleted(createPages(2));

      const view = completed.toView('http://test.local');

      expect(view.status).toBe('completed');
      expect(view.progress).toBe(100);
      expect(view.pageCount).toBe(2);
      expect(view.images).toEqual([
        {
          index: 1,
          filename: 'page-1.png',
          format: 'png',
          dpi: 150,
          sizeBytes: 100,
          url: 'http://test.local/images/job-123/page-1.png',
        },
        {
          index: 2,
          filename: 'page-2.png',
          format: 'png',
          dpi: 150,
          sizeBytes: 101,
          url: 'http://test.local/images/job-123/page-2.png',
        },
      ]);
    });
  });

  describe('fromData', () => {
    it('should rehydrate with working methods', () => {
      const original = createQueuedJob();
      const rehydrated = ConversionJob.fromData({ ...original });

      expect(rehydrated.transitionToConverting().status.value).toBe(JobStatus.CONVERTING);
      expect(rehydrated.toJSON()).toEqual(original.toJSON());
    });
  });
});
