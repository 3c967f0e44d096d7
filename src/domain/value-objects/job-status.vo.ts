/**
 * Job Status Value Object
 * Represents the lifecycle stage of a conversion job
 */
export enum JobStatus {
  QUEUED = 'queued',
  CONVERTING = 'converting',
  RASTERIZING = 'rasterizing',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

const TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  [JobStatus.QUEUED]: [JobStatus.CONVERTING, JobStatus.FAILED],
  [JobStatus.CONVERTING]: [JobStatus.RASTERIZING, JobStatus.FAILED],
  [JobStatus.RASTERIZING]: [JobStatus.COMPLETED, JobStatus.FAILED],
  [JobStatus.COMPLETED]: [],
  [JobStatus.FAILED]: [],
};

const PROGRESS: Record<JobStatus, number> = {
  [JobStatus.QUEUED]: 0,
  [JobStatus.CONVERTING]: 10,
  [JobStatus.RASTERIZING]: 50,
  [JobStatus.COMPLETED]: 100,
  [JobStatus.FAILED]: 100,
};

function isJobStatus(value: string): value is JobStatus {
  return (Object.values(JobStatus) as string[]).includes(value);
}

export class JobStatusVO {
  private constructor(private readonly _value: JobStatus) {}

  static fromString(value: string): JobStatusVO {
    const normalizedValue = value.toLowerCase();
    if (!isJobStatus(normalizedValue)) {
      throw new Error(`Invalid job status: ${value}`);
    }
    return new JobStatusVO(normalizedValue);
  }

  static queued(): JobStatusVO {
    return new JobStatusVO(JobStatus.QUEUED);
  }

  static converting(): JobStatusVO {
    return new JobStatusVO(JobStatus.CONVERTING);
  }

  static rasterizing(): JobStatusVO {
    return new JobStatusVO(JobStatus.RASTERIZING);
  }

  static completed(): JobStatusVO {
    return new JobStatusVO(JobStatus.COMPLETED);
  }

  static failed(): JobStatusVO {
    return new JobStatusVO(JobStatus.FAILED);
  }

  get value(): JobStatus {
    return this._value;
  }

  /**
   * Coarse progress indicator reported to pollers.
   */
  get progress(): number {
    return PROGRESS[this._value];
  }

  isTerminal(): boolean {
    return this._value === JobStatus.COMPLETED || this._value === JobStatus.FAILED;
  }

  isQueued(): boolean {
    return this._value === JobStatus.QUEUED;
  }

  isRasterizing(): boolean {
    return this._value === JobStatus.RASTERIZING;
  }

  isCompleted(): boolean {
    return this._value === JobStatus.COMPLETED;
  }

  isFailed(): boolean {
    return this._value === JobStatus.FAILED;
  }

  canTransitionTo(newStatus: JobStatusVO): boolean {
    return TRANSITIONS[this._value].includes(newStatus._value);
  }

  equals(other: JobStatusVO): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
