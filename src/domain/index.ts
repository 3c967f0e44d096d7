/**
 * Domain Layer Barrel Export
 *
 * The domain layer is the core of the application and depends on nothing
 * outside it except Immer and uuid.
 */

// Entities
export {
  ConversionJob,
  type ConversionJobData,
  type ConversionJobView,
  type PageImageView,
} from './entities/conversion-job.entity';

// Value Objects
export { JobStatusVO, JobStatus } from './value-objects/job-status.vo';
export {
  type ConversionOptions,
  type ImageFormat,
  validateConversionOptions,
  imageExtension,
  IMAGE_CONTENT_TYPES,
} from './value-objects/conversion-options.vo';
export {
  type PageImage,
  createPageImage,
  pageFilename,
  parsePageIndex,
  isPageFilename,
  sortPages,
  hasContiguousIndices,
} from './value-objects/page-image.vo';

// Errors
export * from './errors/conversion.errors';

// Events
export * from './events';
