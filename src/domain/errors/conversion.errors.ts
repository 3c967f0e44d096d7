/**
 * Conversion error taxonomy.
 *
 * Every failure that ends a job is one of these kinds. The orchestrator turns
 * them into a terminal `failed` state; none of them is retried automatically.
 */
export enum ConversionErrorKind {
  RESOURCE_ERROR = 'ResourceError',
  CONVERSION_TIMEOUT = 'ConversionTimeout',
  CONVERSION_FAILED = 'ConversionFailed',
  RASTERIZATION_FAILED = 'RasterizationFailed',
  NOT_FOUND = 'NotFound',
}

/**
 * Serializable error detail stored on a failed job.
 */
export interface JobErrorDetail {
  readonly kind: ConversionErrorKind;
  readonly message: string;
  readonly tool?: string;
  readonly exitCode?: number | null;
  readonly stderr?: string;
}

export interface ToolFailureContext {
  tool?: string;
  exitCode?: number | null;
  stderr?: string;
  cause?: unknown;
}

export abstract class ConversionError extends Error {
  abstract readonly kind: ConversionErrorKind;
  readonly tool?: string;
  readonly exitCode?: number | null;
  readonly stderr?: string;

  protected constructor(message: string, context: ToolFailureContext = {}) {
    super(message, context.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = new.target.name;
    this.tool = context.tool;
    this.exitCode = context.exitCode;
    this.stderr = context.stderr;
  }

  toDetail(): JobErrorDetail {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.tool !== undefined && { tool: this.tool }),
      ...(this.exitCode !== undefined && { exitCode: this.exitCode }),
      ...(this.stderr && { stderr: this.stderr }),
    };
  }
}

/**
 * Workspace could not be allocated. Fatal for the job.
 */
export class ResourceError extends ConversionError {
  readonly kind = ConversionErrorKind.RESOURCE_ERROR;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

/**
 * An external tool exceeded its wall-clock budget and was killed.
 */
export class ConversionTimeoutError extends ConversionError {
  readonly kind = ConversionErrorKind.CONVERSION_TIMEOUT;

  constructor(
    tool: string,
    readonly timeoutMs: number,
    stderr?: string,
  ) {
    super(`${tool} did not finish within ${timeoutMs}ms and was terminated`, {
      tool,
      stderr,
    });
  }
}

/**
 * Malformed or unsupported input, a renderer crash, or a missing renderer.
 */
export class ConversionFailedError extends ConversionError {
  readonly kind = ConversionErrorKind.CONVERSION_FAILED;

  constructor(message: string, context: ToolFailureContext = {}) {
    super(message, context);
  }
}

/**
 * Zero or inconsistent page output, or a rasterizer failure.
 */
export class RasterizationFailedError extends ConversionError {
  readonly kind = ConversionErrorKind.RASTERIZATION_FAILED;

  constructor(message: string, context: ToolFailureContext = {}) {
    super(message, context);
  }
}

/**
 * Unknown job id. A client error, not a system fault.
 */
export class JobNotFoundError extends ConversionError {
  readonly kind = ConversionErrorKind.NOT_FOUND;

  constructor(readonly jobId: string) {
    super(`Job not found: ${jobId}`);
  }
}

export class InvalidJobTransitionError extends Error {
  constructor(
    readonly from: string,
    readonly to: string,
  ) {
    super(`Invalid status transition from ${from} to ${to}`);
    this.name = 'InvalidJobTransitionError';
  }
}

export type UploadRejectionReason =
  | 'missing_file'
  | 'unsupported_extension'
  | 'too_large'
  | 'invalid_options';

/**
 * Raised before a job exists; nothing has been handed to the orchestrator.
 */
export class UploadRejectedError extends Error {
  constructor(
    readonly reason: UploadRejectionReason,
    message: string,
  ) {
    super(message);
    this.name = 'UploadRejectedError';
  }
}

/**
 * The job exists but is not in a state that allows the requested operation.
 */
export class JobStateConflictError extends Error {
  constructor(
    readonly jobId: string,
    readonly status: string,
    message: string,
    readonly detail?: JobErrorDetail,
  ) {
    super(message);
    this.name = 'JobStateConflictError';
  }
}

export class QueueFullError extends Error {
  constructor(readonly queuedJobs: number) {
    super(`Conversion queue is full (${queuedJobs} jobs waiting)`);
    this.name = 'QueueFullError';
  }
}

export function toJobErrorDetail(error: unknown): JobErrorDetail {
  if (error instanceof ConversionError) {
    return error.toDetail();
  }

  return {
    kind: ConversionErrorKind.CONVERSION_FAILED,
    message: error instanceof Error ? error.message : 'Unknown error',
  };
}
