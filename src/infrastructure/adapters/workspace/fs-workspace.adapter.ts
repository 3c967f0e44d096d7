import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import type { Workspace, WorkspacePort } from '../../../application/ports/output/workspace.port';
import type { AppConfig } from '../../../config/configuration';
import { ResourceError } from '../../../domain/errors/conversion.errors';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

export const PAGES_DIRECTORY = 'pages';
export const SOURCE_BASENAME = 'source';

/**
 * Filesystem Workspace Adapter
 * Implements WorkspacePort with one directory per job under WORKSPACE_ROOT
 */
@Injectable()
export class FsWorkspaceAdapter implements WorkspacePort {
  private readonly root: string;
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(ConfigService) configService: ConfigService<AppConfig, true>,
    @Inject(PinoLoggerService) logger: PinoLoggerService,
  ) {
    this.root = path.resolve(configService.get('storage.workspaceRoot', { infer: true }));
    this.logger = logger.forContext(FsWorkspaceAdapter.name);
  }

  async acquire(jobId: string): Promise<Workspace> {
    const workspacePath = this.resolve(jobId);
    const pagesDir = path.join(workspacePath, PAGES_DIRECTORY);

    try {
      await fs.mkdir(this.root, { recursive: true });
      // Not recursive: an existing directory means another owner
      await fs.mkdir(workspacePath);
      await fs.mkdir(pagesDir);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ResourceError(`Could not create workspace for job ${jobId}: ${reason}`, error);
    }

    this.logger.debug({ jobId, path: workspacePath }, 'Workspace acquired');

    return { jobId, path: workspacePath, pagesDir };
  }

  async writeSource(workspace: Workspace, extension: string, content: Buffer): Promise<string> {
    const sourcePath = path.join(workspace.path, `${SOURCE_BASENAME}${extension}`);

    try {
      // wx: never overwrite
      await fs.writeFile(sourcePath, content, { flag: 'wx' });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ResourceError(
        `Could not write source document for job ${workspace.jobId}: ${reason}`,
        error,
      );
    }

    return sourcePath;
  }

  async release(jobId: string): Promise<void> {
    const workspacePath = this.resolve(jobId);

    try {
      await fs.rm(workspacePath, { recursive: true, force: true });
      this.logger.debug({ jobId, path: workspacePath }, 'Workspace released');
    } catch (error) {
      this.logger.error(
        {
          jobId,
          path: workspacePath,
          error: error instanceof Error ? error.message : String(error),
        },
        'Failed to remove workspace',
      );
    }
  }

  async exists(jobId: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.resolve(jobId));
      return stats.isDirectory();
    } catch {
      return false;
    }
  }

  private resolve(jobId: string): string {
    const workspacePath = path.resolve(this.root, jobId);
    if (path.dirname(workspacePath) !== this.root) {
      throw new ResourceError(`Invalid job id for a workspace: ${jobId}`);
    }
    return workspacePath;
  }
}
