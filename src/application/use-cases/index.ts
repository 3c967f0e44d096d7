/**
 * Use Cases Barrel Export
 */
export { SubmitConversionUseCase } from './submit-conversion.use-case';
export { RunConversionUseCase } from './run-conversion.use-case';
export { GetJobUseCase } from './get-job.use-case';
export { ListJobsUseCase } from './list-jobs.use-case';
export { DeleteJobUseCase } from './delete-job.use-case';
