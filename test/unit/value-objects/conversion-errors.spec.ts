import { describe, it, expect } from 'vitest';
import {
  ConversionErrorKind,
  ConversionFailedError,
  JobNotFoundError,
  RasterizationFailedError,
  ResourceError,
  toJobErrorDetail,
} from '../../../src/domain/errors/conversion.errors';

describe('conversion errors', () => {
  it('should carry tool context into the detail', () => {
    const error = new ConversionFailedError('Document converter exited with code 3', {
      tool: 'converter',
      exitCode: 3,
      stderr: 'simulated renderer crash',
    });

    expect(error.name).toBe('ConversionFailedError');
    expect(error.toDetail()).toEqual({
      kind: ConversionErrorKind.CONVERSION_FAILED,
      message: 'Document converter exited with code 3',
      tool: 'converter',
      exitCode: 3,
      stderr: 'simulated renderer crash',
    });
  });

  it('should omit absent fields', () => {
    expect(new ResourceError('disk full').toDetail()).toEqual({
      kind: ConversionErrorKind.RESOURCE_ERROR,
      message: 'disk full',
    });
  });

  it('should keep the cause', () => {
    const cause = new Error('EACCES');
    expect(new ResourceError('no workspace', cause).cause).toBe(cause);
  });

  it('should map unknown errors to ConversionFailed', () => {
    expect(toJobErrorDetail(new Error('odd'))).toEqual({
      kind: ConversionErrorKind.CONVERSION_FAILED,
      message: 'odd',
    });
    expect(toJobErrorDetail('nope')).toEqual({
      kind: ConversionErrorKind.CONVERSION_FAILED,
      message: 'Unknown error',
    });
    expect(toJobErrorDetail(new RasterizationFailedError('no pages')).kind).toBe(
      ConversionErrorKind.RASTERIZATION_FAILED,
    );
  });

  it('should name the job that was not found', () => {
    const error = new JobNotFoundError('missing');
    expect(error.message).toBe('Job not found: missing');
    expect(error.kind).toBe(ConversionErrorKind.NOT_FOUND);
  });
});
