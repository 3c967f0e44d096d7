import type { ConversionJob } from '../../../domain/entities/conversion-job.entity';
import type { ConversionOptions } from '../../../domain/value-objects/conversion-options.vo';

/**
 * Submit Conversion Command
 * Options left out fall back to the configured defaults
 */
export interface SubmitConversionCommand {
  filename: string;
  content: Buffer;
  options?: Partial<ConversionOptions>;
}

/**
 * Submit Conversion Result
 */
export interface SubmitConversionResult {
  /** Snapshot taken right after the job was queued. */
  job: ConversionJob;
  /** Settles with the terminal snapshot; never rejects. */
  completion: Promise<ConversionJob>;
}

/**
 * Submit Conversion Port (Driving Port / Use Case Interface)
 * Accepts an upload and hands it to the conversion pool
 */
export interface SubmitConversionPort {
  execute(command: SubmitConversionCommand): Promise<SubmitConversionResult>;
}
