import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/config/configuration';
import { validateEnv } from '../../../src/config/validation.schema';

describe('configuration', () => {
  it('should apply defaults', () => {
    const config = buildConfig(validateEnv({ NODE_ENV: 'test' }));

    expect(config.server).toEqual({
      port: 4000,
      host: '0.0.0.0',
      baseUrl: 'http://localhost:4000',
      corsOrigins: ['*'],
    });
    expect(config.converter.candidates).toEqual(['soffice', 'libreoffice']);
    expect(config.converter.profileDir).toBe('/tmp/slide-raster/workspaces/.converter-profile');
    expect(config.converter.concurrency).toBe(1);
    expect(config.rasterizer).toEqual({
      command: 'pdftoppm',
      timeoutMs: 120000,
      defaultDpi: 150,
      maxDpi: 600,
      defaultFormat: 'png',
      jpegQuality: 95,
    });
    expect(config.upload).toEqual({
      maxSizeBytes: 100 * 1024 * 1024,
      allowedExtensions: ['.ppt', '.pptx'],
    });
    expect(config.retention.retentionMinutes).toBe(0);
  });

  it('should use an explicit converter command as the only candidate', () => {
    const config = buildConfig(
      validateEnv({ NODE_ENV: 'test', CONVERTER_COMMAND: '/opt/office/program/soffice' }),
    );

    expect(config.converter.candidates).toEqual(['/opt/office/program/soffice']);
  });

  it('should normalize the extension list', () => {
    const config = buildConfig(
      validateEnv({ NODE_ENV: 'test', ALLOWED_EXTENSIONS: 'PPTX, odp,,.key' }),
    );

    expect(config.upload.allowedExtensions).toEqual(['.pptx', '.odp', '.key']);
  });

  it('should split the allowed CORS origins', () => {
    const config = buildConfig(
      validateEnv({ NODE_ENV: 'test', CORS_ORIGINS: 'https://a.test, https://b.test,' }),
    );

    expect(config.server.corsOrigins).toEqual(['https://a.test', 'https://b.test']);
  });

  it('should reject an empty CORS origin list', () => {
    expect(() => validateEnv({ NODE_ENV: 'test', CORS_ORIGINS: ' , ' })).toThrow(
      'Environment validation failed',
    );
  });

  it('should strip trailing slashes from the base url', () => {
    const config = buildConfig(
      validateEnv({ NODE_ENV: 'test', API_BASE_URL: 'https://slides.test.local/api//' }),
    );

    expect(config.server.baseUrl).toBe('https://slides.test.local/api');
  });

  it('should coerce numeric strings', () => {
    const config = buildConfig(
      validateEnv({
        NODE_ENV: 'test',
        PORT: '8080',
        WORKER_POOL_SIZE: '3',
        MAX_QUEUED_JOBS: '0',
        MAX_UPLOAD_SIZE_MB: '1',
      }),
    );

    expect(config.server.port).toBe(8080);
    expect(config.conversionPool).toEqual({ poolSize: 3, maxQueuedJobs: 0 });
    expect(config.upload.maxSizeBytes).toBe(1048576);
  });

  it('should reject a default dpi above the maximum', () => {
    expect(() => validateEnv({ NODE_ENV: 'test', DEFAULT_DPI: '300', MAX_DPI: '200' })).toThrow(
      'DEFAULT_DPI: DEFAULT_DPI must not exceed MAX_DPI',
    );
  });

  it('should list every invalid variable', () => {
    expect(() => validateEnv({ NODE_ENV: 'test', PORT: '0', LOG_LEVEL: 'loud' })).toThrow(
      /Environment validation failed:\n {2}- PORT: .*\n {2}- LOG_LEVEL: /,
    );
  });
});
