import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthIndicator,
  type HealthIndicatorResult,
  HealthCheckError,
} from '@nestjs/terminus';
import { promises as fs } from 'fs';
import type { AppConfig } from '../../config/configuration';

interface DiskUsage {
  path: string;
  totalBytes: number;
  freeBytes: number;
  freePercent: number;
}

/**
 * Free space on the filesystems holding workspaces and page images.
 */
@Injectable()
export class DiskSpaceHealthIndicator extends HealthIndicator {
  private readonly directories: string[];
  private readonly minFreeSpacePercent = 10;

  constructor(@Inject(ConfigService) configService: ConfigService<AppConfig, true>) {
    super();

    const storage = configService.get('storage', { infer: true });
    this.directories = [...new Set([storage.workspaceRoot, storage.outputDir])];
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    try {
      const usage = await Promise.all(this.directories.map((dir) => this.getDiskUsage(dir)));
      const details = {
        directories: usage.map((entry) => ({
          ...entry,
          freePercent: Math.round(entry.freePercent * 10) / 10,
        })),
      };

      const low = usage.find((entry) => entry.freePercent < this.minFreeSpacePercent);
      if (!low) {
        return this.getStatus(key, true, details);
      }

      throw new HealthCheckError(
        `Low disk space: ${low.freePercent.toFixed(1)}% free at ${low.path}`,
        this.getStatus(key, false, details),
      );
    } catch (error) {
      if (error instanceof HealthCheckError) {
        throw error;
      }

      throw new HealthCheckError(
        'Disk space check failed',
        this.getStatus(key, false, {
          error: error instanceof Error ? error.message : String(error),
        }),
      );
    }
  }

  private async getDiskUsage(dir: string): Promise<DiskUsage> {
    // Ensure the directory exists
    await fs.mkdir(dir, { recursive: true });

    const stats = await fs.statfs(dir);
    const totalBytes = stats.blocks * stats.bsize;
    const freeBytes = stats.bavail * stats.bsize;

    return {
      path: dir,
      totalBytes,
      freeBytes,
      freePercent: totalBytes > 0 ? (freeBytes / totalBytes) * 100 : 100,
    };
  }
}
