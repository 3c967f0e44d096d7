import { describe, it, expect } from 'vitest';
import {
  parseConvertQuery,
  toConversionOptions,
} from '../../../src/conversion/dto/convert-query.dto';
import { UploadRejectedError } from '../../../src/domain/errors/conversion.errors';

describe('parseConvertQuery', () => {
  it('should accept an empty query', () => {
    expect(parseConvertQuery(undefined)).toEqual({});
    expect(parseConvertQuery({})).toEqual({});
  });

  it('should coerce numbers and normalize the format', () => {
    expect(parseConvertQuery({ dpi: '200', format: 'jpg', width: '1024', wait: '1' })).toEqual({
      dpi: 200,
      format: 'jpeg',
      width: 1024,
      wait: true,
    });
    expect(parseConvertQuery({ format: 'png', wait: 'false' })).toEqual({
      format: 'png',
      wait: false,
    });
  });

  it('should reject bad values as invalid_options', () => {
    let caught: unknown;
    try {
      parseConvertQuery({ dpi: '-5', format: 'gif' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UploadRejectedError);
    expect(caught).toMatchObject({ reason: 'invalid_options' });
    expect(caught instanceof Error ? caught.message : '').toMatch(/^dpi: .+; format: .+$/);
  });

  it('should reject a fractional dpi', () => {
    expect(() => parseConvertQuery({ dpi: '72.5' })).toThrow(/^dpi: /);
  });
});

describe('toConversionOptions', () => {
  it('should keep only the rendering options that were given', () => {
    expect(toConversionOptions({ dpi: 200, wait: true })).toEqual({ dpi: 200 });
    expect(toConversionOptions({ format: 'jpeg', height: 600 })).toEqual({
      format: 'jpeg',
      height: 600,
    });
  });
});
