import { z } from 'zod';
import { UploadRejectedError } from '../../domain/errors/conversion.errors';
import type { ConversionOptions } from '../../domain/value-objects/conversion-options.vo';

const positiveInt = z.coerce.number().int().positive();

/**
 * Query string of `POST /convert`. Range checks that depend on
 * configuration (MAX_DPI) happen in the use case.
 */
export const convertQuerySchema = z.object({
  dpi: positiveInt.optional(),
  format: z
    .enum(['png', 'jpeg', 'jpg'])
    .transform((format): ConversionOptions['format'] => (format === 'png' ? 'png' : 'jpeg'))
    .optional(),
  width: positiveInt.optional(),
  height: positiveInt.optional(),
  wait: z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1')
    .optional(),
});

export type ConvertQuery = z.infer<typeof convertQuerySchema>;

export function parseConvertQuery(query: unknown): ConvertQuery {
  const result = convertQuerySchema.safeParse(query ?? {});

  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new UploadRejectedError('invalid_options', message);
  }

  return result.data;
}

export function toConversionOptions(query: ConvertQuery): Partial<ConversionOptions> {
  return {
    ...(query.dpi !== undefined && { dpi: query.dpi }),
    ...(query.format !== undefined && { format: query.format }),
    ...(query.width !== undefined && { width: query.width }),
    ...(query.height !== undefined && { height: query.height }),
  };
}
