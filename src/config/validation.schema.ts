import { availableParallelism } from 'os';
import { z } from 'zod';

const extensionList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((ext) => ext.trim().toLowerCase())
      .filter((ext) => ext.length > 0)
      .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`)),
  )
  .pipe(z.array(z.string()).min(1));

const originList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  )
  .pipe(z.array(z.string()).min(1));

export const envSchema = z
  .object({
    // Core
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(4000),
    HOST: z.string().default('0.0.0.0'),
    API_BASE_URL: z.string().url().default('http://localhost:4000'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    CORS_ORIGINS: originList.default('*'),

    // Filesystem
    WORKSPACE_ROOT: z.string().default('/tmp/slide-raster/workspaces'),
    OUTPUT_DIR: z.string().default('/tmp/slide-raster/output'),

    // Document converter
    CONVERTER_COMMAND: z.string().optional(),
    CONVERTER_PROFILE_DIR: z.string().optional(),
    CONVERTER_LOCALE: z.string().default('C.UTF-8'),
    CONVERTER_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
    CONVERTER_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),

    // Page rasterizer
    RASTERIZER_COMMAND: z.string().default('pdftoppm'),
    RASTERIZER_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
    DEFAULT_DPI: z.coerce.number().int().min(36).default(150),
    MAX_DPI: z.coerce.number().int().min(36).max(1200).default(600),
    DEFAULT_IMAGE_FORMAT: z.enum(['png', 'jpeg']).default('png'),
    JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(95),

    // Conversion pool
    WORKER_POOL_SIZE: z.coerce.number().int().min(1).max(64).default(Math.min(availableParallelism(), 64)),
    MAX_QUEUED_JOBS: z.coerce.number().int().min(0).default(100),

    // Uploads
    MAX_UPLOAD_SIZE_MB: z.coerce.number().positive().default(100),
    ALLOWED_EXTENSIONS: extensionList.default('.ppt,.pptx'),

    // Retention
    JOB_RETENTION_MINUTES: z.coerce.number().min(0).default(0),
    RETENTION_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60000),
  })
  .refine((env) => env.DEFAULT_DPI <= env.MAX_DPI, {
    message: 'DEFAULT_DPI must not exceed MAX_DPI',
    path: ['DEFAULT_DPI'],
  });

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
