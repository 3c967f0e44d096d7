import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createReadStream, promises as fs } from 'fs';
import * as path from 'path';
import type {
  ArtifactStorePort,
  StoredArtifact,
} from '../../../application/ports/output/artifact-store.port';
import type { AppConfig } from '../../../config/configuration';
import { ResourceError } from '../../../domain/errors/conversion.errors';
import { IMAGE_CONTENT_TYPES } from '../../../domain/value-objects/conversion-options.vo';
import {
  createPageImage,
  isPageFilename,
  type PageImage,
} from '../../../domain/value-objects/page-image.vo';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Local Artifact Store Adapter
 * Implements ArtifactStorePort with a directory per job under OUTPUT_DIR
 */
@Injectable()
export class LocalArtifactStoreAdapter implements ArtifactStorePort {
  private readonly outputDir: string;
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(ConfigService) configService: ConfigService<AppConfig, true>,
    @Inject(PinoLoggerService) logger: PinoLoggerService,
  ) {
    this.outputDir = path.resolve(configService.get('storage.outputDir', { infer: true }));
    this.logger = logger.forContext(LocalArtifactStoreAdapter.name);
  }

  async persist(jobId: string, pages: readonly PageImage[]): Promise<PageImage[]> {
    const jobDir = this.jobDirectory(jobId);
    if (!jobDir) {
      throw new ResourceError(`Invalid job id for the artifact store: ${jobId}`);
    }

    try {
      await fs.mkdir(jobDir, { recursive: true });

      const stored: PageImage[] = [];
      for (const page of pages) {
        const target = path.join(jobDir, page.filename);
        await this.move(page.path, target);
        stored.push(createPageImage({ ...page, path: target }));
      }

      this.logger.debug({ jobId, pageCount: stored.length, dir: jobDir }, 'Stored page images');
      return stored;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ResourceError(`Could not store page images for job ${jobId}: ${reason}`, error);
    }
  }

  async open(jobId: string, filename: string): Promise<StoredArtifact | null> {
    const jobDir = this.jobDirectory(jobId);
    if (!jobDir || !isPageFilename(filename)) {
      return null;
    }

    const filePath = path.join(jobDir, filename);
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) return null;

      return {
        stream: createReadStream(filePath),
        sizeBytes: stats.size,
        contentType: filename.endsWith('.png') ? IMAGE_CONTENT_TYPES.png : IMAGE_CONTENT_TYPES.jpeg,
      };
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  async remove(jobId: string): Promise<void> {
    const jobDir = this.jobDirectory(jobId);
    if (!jobDir) return;

    await fs.rm(jobDir, { recursive: true, force: true });
    this.logger.debug({ jobId, dir: jobDir }, 'Removed page images');
  }

  /**
   * Null for ids that would leave OUTPUT_DIR.
   */
  private jobDirectory(jobId: string): string | null {
    const jobDir = path.resolve(this.outputDir, jobId);
    return path.dirname(jobDir) === this.outputDir ? jobDir : null;
  }

  private async move(source: string, target: string): Promise<void> {
    try {
      await fs.rename(source, target);
    } catch (error) {
      // Workspace and output directory may sit on different filesystems
      if (isErrnoException(error) && error.code === 'EXDEV') {
        await fs.copyFile(source, target);
        await fs.unlink(source);
        return;
      }
      throw error;
    }
  }
}
