import { describe, it, expect } from 'vitest';
import {
  imageExtension,
  validateConversionOptions,
} from '../../../src/domain/value-objects/conversion-options.vo';

describe('validateConversionOptions', () => {
  const limits = { maxDpi: 600 };

  it('should accept defaults', () => {
    expect(validateConversionOptions({ dpi: 150, format: 'png' }, limits)).toEqual([]);
  });

  it('should report a dpi above the limit', () => {
    expect(validateConversionOptions({ dpi: 601, format: 'png' }, limits)).toEqual([
      'dpi must not exceed 600',
    ]);
  });

  it('should report every bad field', () => {
    expect(
      validateConversionOptions({ dpi: 1.5, format: 'jpeg', width: 0, height: -2 }, limits),
    ).toEqual([
      'dpi must be a positive integer',
      'width must be a positive integer',
      'height must be a positive integer',
    ]);
  });

  it('should map jpeg to the jpg extension', () => {
    expect(imageExtension('jpeg')).toBe('jpg');
    expect(imageExtension('png')).toBe('png');
  });
});
