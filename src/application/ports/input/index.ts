/**
 * Input Ports (Driving Ports / Use Case Interfaces) Barrel Export
 * These are the interfaces that define the application's use cases
 */
export type {
  SubmitConversionPort,
  SubmitConversionCommand,
  SubmitConversionResult,
} from './submit-conversion.port';
export type { RunConversionPort, RunConversionCommand } from './run-conversion.port';
export type { GetJobPort, GetJobResultResult } from './get-job.port';
export type { ListJobsPort } from './list-jobs.port';
export type { DeleteJobPort } from './delete-job.port';
