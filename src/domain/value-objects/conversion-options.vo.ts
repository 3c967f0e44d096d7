export type ImageFormat = 'png' | 'jpeg';

/**
 * Rendering options chosen at submission time and fixed for the job's life.
 */
export interface ConversionOptions {
  readonly dpi: number;
  readonly format: ImageFormat;
  /** Target pixel width; height follows the aspect ratio when omitted. */
  readonly width?: number;
  /** Target pixel height; width follows the aspect ratio when omitted. */
  readonly height?: number;
}

export interface ConversionOptionLimits {
  maxDpi: number;
}

export const IMAGE_EXTENSIONS: Record<ImageFormat, string> = {
  png: 'png',
  jpeg: 'jpg',
};

export const IMAGE_CONTENT_TYPES: Record<ImageFormat, string> = {
  png: 'image/png',
  jpeg: 'image/jpeg',
};

/**
 * Returns a list of human-readable problems; empty when the options are usable.
 */
export function validateConversionOptions(
  options: ConversionOptions,
  limits: ConversionOptionLimits,
): string[] {
  const problems: string[] = [];

  if (!Number.isInteger(options.dpi) || options.dpi < 1) {
    problems.push('dpi must be a positive integer');
  } else if (options.dpi > limits.maxDpi) {
    problems.push(`dpi must not exceed ${limits.maxDpi}`);
  }

  for (const [name, value] of [
    ['width', options.width],
    ['height', options.height],
  ] as const) {
    if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
      problems.push(`${name} must be a positive integer`);
    }
  }

  return problems;
}

export function imageExtension(format: ImageFormat): string {
  return IMAGE_EXTENSIONS[format];
}
