/**
 * Application Configuration Module
 *
 * Central configuration management for the slide raster service.
 * Loads and validates environment variables, providing type-safe access
 * to all configuration values throughout the application.
 *
 * ## Configuration Sources:
 * 1. Environment variables (`.env` file or system environment)
 * 2. Validated by Zod schema in `validation.schema.ts`
 * 3. Transformed into typed AppConfig object
 *
 * ## Usage:
 * ```typescript
 * // In NestJS service
 * constructor(@Inject(ConfigService) private configService: ConfigService<AppConfig>) {}
 *
 * const poolSize = this.configService.get('conversionPool.poolSize', { infer: true });
 * ```
 *
 * @module Configuration
 */

import * as path from 'path';
import type { ImageFormat } from '../domain/value-objects/conversion-options.vo';
import { validateEnv, type EnvConfig } from './validation.schema';

/**
 * Application configuration interface.
 *
 * Organized by concern (server, converter, rasterizer, pool, ...) so each
 * provider reads only its own section.
 */
export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  server: {
    port: number;
    host: string;
    /**
     * Prefix for every image URL handed back to clients. Only affects how
     * references are built, never where files live.
     */
    baseUrl: string;
    /**
     * ### corsOrigins (Environment: CORS_ORIGINS)
     * - Comma separated; `*` allows any origin
     */
    corsOrigins: string[];
  };
  storage: {
    workspaceRoot: string;
    outputDir: string;
  };
  /**
   * External office renderer used to produce the intermediate PDF.
   *
   * ### candidates (Environment: CONVERTER_COMMAND)
   * - Left unset, `soffice` is preferred and `libreoffice` is the fallback
   * - An absolute path skips the PATH lookup
   *
   * ### concurrency (Environment: CONVERTER_CONCURRENCY)
   * - The renderer locks its user profile for the whole run
   * - Each concurrent run gets `<profileDir>/slot-<n>` as its own profile
   */
  converter: {
    candidates: string[];
    profileDir: string;
    locale: string;
    timeoutMs: number;
    concurrency: number;
  };
  rasterizer: {
    command: string;
    timeoutMs: number;
    defaultDpi: number;
    maxDpi: number;
    defaultFormat: ImageFormat;
    jpegQuality: number;
  };
  /**
   * Conversion pool configuration.
   *
   * ### poolSize (Environment: WORKER_POOL_SIZE)
   * - Number of jobs allowed to run at once
   * - Defaults to the number of available CPU cores
   * - Rasterization is CPU bound, conversion is serialized separately
   *
   * ### maxQueuedJobs (Environment: MAX_QUEUED_JOBS)
   * - Jobs waiting for a free slot; submissions beyond it are refused with 503
   */
  conversionPool: {
    poolSize: number;
    maxQueuedJobs: number;
  };
  upload: {
    maxSizeBytes: number;
    allowedExtensions: string[];
  };
  /**
   * ### retentionMinutes (Environment: JOB_RETENTION_MINUTES)
   * - 0 keeps finished jobs and their images for the lifetime of the process
   * - Any positive value evicts terminal jobs older than the TTL
   */
  retention: {
    retentionMinutes: number;
    sweepIntervalMs: number;
  };
}

export function buildConfig(env: EnvConfig): AppConfig {
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    server: {
      port: env.PORT,
      host: env.HOST,
      baseUrl: env.API_BASE_URL.replace(/\/+$/, ''),
      corsOrigins: env.CORS_ORIGINS,
    },
    storage: {
      workspaceRoot: path.resolve(env.WORKSPACE_ROOT),
      outputDir: path.resolve(env.OUTPUT_DIR),
    },
    converter: {
      candidates: env.CONVERTER_COMMAND ? [env.CONVERTER_COMMAND] : ['soffice', 'libreoffice'],
      profileDir: path.resolve(
        env.CONVERTER_PROFILE_DIR ?? path.join(env.WORKSPACE_ROOT, '.converter-profile'),
      ),
      locale: env.CONVERTER_LOCALE,
      timeoutMs: env.CONVERTER_TIMEOUT_MS,
      concurrency: env.CONVERTER_CONCURRENCY,
    },
    rasterizer: {
      command: env.RASTERIZER_COMMAND,
      timeoutMs: env.RASTERIZER_TIMEOUT_MS,
      defaultDpi: env.DEFAULT_DPI,
      maxDpi: env.MAX_DPI,
      defaultFormat: env.DEFAULT_IMAGE_FORMAT,
      jpegQuality: env.JPEG_QUALITY,
    },
    conversionPool: {
      poolSize: env.WORKER_POOL_SIZE,
      maxQueuedJobs: env.MAX_QUEUED_JOBS,
    },
    upload: {
      maxSizeBytes: Math.floor(env.MAX_UPLOAD_SIZE_MB * 1024 * 1024),
      allowedExtensions: env.ALLOWED_EXTENSIONS,
    },
    retention: {
      retentionMinutes: env.JOB_RETENTION_MINUTES,
      sweepIntervalMs: env.RETENTION_SWEEP_INTERVAL_MS,
    },
  };
}

export default (): AppConfig => buildConfig(validateEnv(process.env));
