import { produce, castDraft, type Draft } from 'immer';
import { JobStatusVO } from '../value-objects/job-status.vo';
import type { ConversionOptions } from '../value-objects/conversion-options.vo';
import { hasContiguousIndices, type PageImage } from '../value-objects/page-image.vo';
import { InvalidJobTransitionError, type JobErrorDetail } from '../errors/conversion.errors';

/**
 * Conversion Job Entity - Aggregate Root
 * One end-to-end request from a source presentation to a set of page images
 *
 * Same hybrid approach as the rest of the domain:
 * - Data stored in a plain readonly interface
 * - Pure functions in the namespace produce new instances via Immer
 * - `create` returns an object carrying both data and bound methods
 */

/**
 * Core data structure for ConversionJob
 */
export interface ConversionJobData {
  readonly jobId: string;
  readonly sourceFilename: string;
  readonly status: JobStatusVO;
  readonly options: ConversionOptions;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly completedAt?: Date;
  readonly error?: JobErrorDetail;
  readonly pages: ReadonlyArray<PageImage>;
  /** Page files the rasterizer has written so far. */
  readonly pagesRendered: number;
}

export interface PageImageView {
  index: number;
  filename: string;
  format: string;
  dpi: number;
  sizeBytes: number;
  url: string;
}

/**
 * Shape returned to API clients. Well-formed for every status.
 */
export interface ConversionJobView {
  jobId: string;
  filename: string;
  status: string;
  progress: number;
  pagesRendered: number;
  options: ConversionOptions;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
  pageCount: number;
  images: PageImageView[];
  error: JobErrorDetail | null;
}

export interface ConversionJob extends ConversionJobData {
  readonly pageCount: number;

  isTerminal(): boolean;

  transitionToConverting(): ConversionJob;
  transitionToRasterizing(): ConversionJob;
  transitionToCompleted(pages: readonly PageImage[]): ConversionJob;
  transitionToFailed(error: JobErrorDetail): ConversionJob;
  recordPagesRendered(count: number): ConversionJob;

  toView(baseUrl: string): ConversionJobView;
  toJSON(): ReturnType<typeof ConversionJob.toJSON>;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace ConversionJob {
  export interface CreateProps {
    jobId: string;
    sourceFilename: string;
    options: ConversionOptions;
    createdAt?: Date;
  }

  export function create(props: CreateProps): ConversionJob {
    validate(props);

    const now = props.createdAt ?? new Date();
    const data: ConversionJobData = {
      jobId: props.jobId,
      sourceFilename: props.sourceFilename,
      status: JobStatusVO.queued(),
      options: { ...props.options },
      createdAt: now,
      updatedAt: now,
      pages: [],
      pagesRendered: 0,
    };

    return attachMethods(data);
  }

  /**
   * Rehydrate from stored data without re-running creation rules.
   */
  export function fromData(data: ConversionJobData): ConversionJob {
    return attachMethods(data);
  }

  function attachMethods(data: ConversionJobData): ConversionJob {
    return Object.freeze({
      ...data,

      get pageCount() {
        return data.pages.length;
      },

      isTerminal: () => data.status.isTerminal(),

      transitionToConverting: () => transitionToConverting(data),
      transitionToRasterizing: () => transitionToRasterizing(data),
      transitionToCompleted: (pages: readonly PageImage[]) => transitionToCompleted(data, pages),
      transitionToFailed: (error: JobErrorDetail) => transitionToFailed(data, error),
      recordPagesRendered: (count: number) => recordPagesRendered(data, count),

      toView: (baseUrl: string) => toView(data, baseUrl),
      toJSON: () => toJSON(data),
    });
  }

  function validate(props: CreateProps): void {
    if (!props.jobId || props.jobId.trim().length === 0) {
      throw new Error('Job ID is required');
    }
    if (!props.sourceFilename || props.sourceFilename.trim().length === 0) {
      throw new Error('Source filename is required');
    }
    if (!Number.isInteger(props.options.dpi) || props.options.dpi < 1) {
      throw new Error('DPI must be a positive integer');
    }
  }

  // ===== State Mutations (Return new instances via Immer) =====

  function transition(
    job: ConversionJobData,
    next: JobStatusVO,
    recipe?: (draft: Draft<ConversionJobData>) => void,
  ): ConversionJob {
    if (!job.status.canTransitionTo(next)) {
      throw new InvalidJobTransitionError(job.status.toString(), next.toString());
    }

    const now = new Date();
    const updated = produce(job, (draft) => {
      draft.status = castDraft(next);
      draft.updatedAt = now;
      if (next.isTerminal()) {
        draft.completedAt = now;
      }
      recipe?.(draft);
    });
    return attachMethods(updated);
  }

  export function transitionToConverting(job: ConversionJobData): ConversionJob {
    return transition(job, JobStatusVO.converting());
  }

  export function transitionToRasterizing(job: ConversionJobData): ConversionJob {
    return transition(job, JobStatusVO.rasterizing());
  }

  export function transitionToCompleted(
    job: ConversionJobData,
    pages: readonly PageImage[],
  ): ConversionJob {
    if (pages.length === 0) {
      throw new Error('Cannot mark job as completed without page images');
    }
    if (!hasContiguousIndices(pages)) {
      throw new Error('Cannot mark job as completed: page indices are not contiguous from 1');
    }

    return transition(job, JobStatusVO.completed(), (draft) => {
      draft.pages = castDraft([...pages]);
      draft.pagesRendered = pages.length;
    });
  }

  export function transitionToFailed(
    job: ConversionJobData,
    error: JobErrorDetail,
  ): ConversionJob {
    return transition(job, JobStatusVO.failed(), (draft) => {
      draft.error = castDraft(error);
      draft.pages = [];
    });
  }

  /**
   * Progress report while rasterizing. Counts never go backwards; reports
   * in any other status leave the job unchanged.
   */
  export function recordPagesRendered(job: ConversionJobData, count: number): ConversionJob {
    if (!job.status.isRasterizing() || count <= job.pagesRendered) {
      return attachMethods(job);
    }

    const updated = produce(job, (draft) => {
      draft.pagesRendered = count;
      draft.updatedAt = new Date();
    });
    return attachMethods(updated);
  }

  // ===== Serialization =====

  export function imageUrl(baseUrl: string, jobId: string, filename: string): string {
    return `${baseUrl}/images/${encodeURIComponent(jobId)}/${encodeURIComponent(filename)}`;
  }

  export function toView(job: ConversionJobData, baseUrl: string): ConversionJobView {
    return {
      jobId: job.jobId,
      filename: job.sourceFilename,
      status: job.status.toString(),
      progress: job.status.progress,
      pagesRendered: job.pagesRendered,
      options: { ...job.options },
      createdAt: job.createdAt.toISOString(),
      updatedAt: job.updatedAt.toISOString(),
      completedAt: job.completedAt ? job.completedAt.toISOString() : null,
      pageCount: job.pages.length,
      images: job.pages.map((page) => ({
        index: page.index,
        filename: page.filename,
        format: page.format,
        dpi: page.dpi,
        sizeBytes: page.sizeBytes,
        url: imageUrl(baseUrl, job.jobId, page.filename),
      })),
      error: job.error ? { ...job.error } : null,
    };
  }

  export function toJSON(job: ConversionJobData) {
    return {
      jobId: job.jobId,
      sourceFilename: job.sourceFilename,
      status: job.status.toString(),
      options: job.options,
      createdAt: job.createdAt.toISOString(),
      updatedAt: job.updatedAt.toISOString(),
      completedAt: job.completedAt?.toISOString(),
      error: job.error,
      pagesRendered: job.pagesRendered,
      pages: job.pages.map((page) => ({ ...page })),
    };
  }
}
