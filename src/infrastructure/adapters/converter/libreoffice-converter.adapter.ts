import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import type { DocumentConverterPort } from '../../../application/ports/output/document-converter.port';
import type { Workspace } from '../../../application/ports/output/workspace.port';
import type { AppConfig } from '../../../config/configuration';
import {
  ConversionFailedError,
  ConversionTimeoutError,
} from '../../../domain/errors/conversion.errors';
import type { ExternalToolInvocation } from '../../../shared/interfaces/tool-invocation.interface';
import { Semaphore } from '../../../shared/concurrency/semaphore';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import {
  ProcessRunnerService,
  ToolNotFoundError,
} from '../../../shared/process/process-runner.service';
import { ToolLocatorService } from '../../../shared/process/tool-locator.service';

export const CONVERTER_TOOL = 'converter';

/**
 * LibreOffice Converter Adapter
 * Implements DocumentConverterPort by running the office suite headless
 *
 * The suite locks its user profile for the duration of a run. Each of the
 * CONVERTER_CONCURRENCY permits owns one profile directory under
 * CONVERTER_PROFILE_DIR (`slot-1`, `slot-2`, ...), handed out with the permit.
 */
@Injectable()
export class LibreOfficeConverterAdapter implements DocumentConverterPort {
  private readonly config: AppConfig['converter'];
  private readonly semaphore: Semaphore;
  private readonly freeProfiles: string[];
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(ConfigService) configService: ConfigService<AppConfig, true>,
    @Inject(ProcessRunnerService) private readonly processRunner: ProcessRunnerService,
    @Inject(ToolLocatorService) private readonly toolLocator: ToolLocatorService,
    @Inject(PinoLoggerService) logger: PinoLoggerService,
  ) {
    this.config = configService.get('converter', { infer: true });
    this.semaphore = new Semaphore(this.config.concurrency);
    this.freeProfiles = Array.from({ length: this.config.concurrency }, (_, slot) =>
      path.join(this.config.profileDir, `slot-${slot + 1}`),
    );
    this.logger = logger.forContext(LibreOfficeConverterAdapter.name);
  }

  async convert(sourcePath: string, workspace: Workspace, timeoutMs: number): Promise<string> {
    const logger = this.logger.withJobId(workspace.jobId);

    await this.assertSourceReadable(sourcePath);

    const resolved = await this.toolLocator.resolveFirst(this.config.candidates);
    if (!resolved) {
      throw new ConversionFailedError(
        `Document converter is not installed (tried ${this.config.candidates.join(', ')})`,
        { tool: CONVERTER_TOOL },
      );
    }

    if (this.semaphore.inUse === this.semaphore.permits) {
      logger.info(
        { waiting: this.semaphore.waiting + 1 },
        'All converter profiles busy, waiting for one',
      );
    }

    logger.info({ command: resolved.path, source: sourcePath }, 'Converting document to PDF');
    const invocation = await this.withProfile((profileDir) => {
      const args = this.buildArgs(sourcePath, workspace, profileDir);
      return this.runTool(resolved.path, args, workspace, timeoutMs);
    });

    if (invocation.timedOut) {
      throw new ConversionTimeoutError(CONVERTER_TOOL, timeoutMs, invocation.stderr);
    }

    if (invocation.exitCode !== 0) {
      const status =
        invocation.exitCode === null
          ? `was terminated by ${invocation.signal ?? 'a signal'}`
          : `exited with code ${invocation.exitCode}`;
      throw new ConversionFailedError(`Document converter ${status}`, {
        tool: CONVERTER_TOOL,
        exitCode: invocation.exitCode,
        stderr: invocation.stderr,
      });
    }

    const pdfPath = path.join(
      workspace.path,
      `${path.basename(sourcePath, path.extname(sourcePath))}.pdf`,
    );
    const pdfSize = await this.fileSize(pdfPath);
    if (pdfSize === null || pdfSize === 0) {
      throw new ConversionFailedError(
        pdfSize === null
          ? 'Document converter produced no PDF output'
          : 'Document converter produced an empty PDF',
        { tool: CONVERTER_TOOL, exitCode: invocation.exitCode, stderr: invocation.stderr },
      );
    }

    logger.info(
      { pdfPath, sizeBytes: pdfSize, durationMs: invocation.durationMs },
      'Document converted to PDF',
    );

    return pdfPath;
  }

  /**
   * Holds a permit and its profile directory for the length of `task`.
   */
  private withProfile<T>(task: (profileDir: string) => Promise<T>): Promise<T> {
    return this.semaphore.runExclusive(async () => {
      const profileDir = this.freeProfiles.shift();
      if (profileDir === undefined) {
        throw new Error('No converter profile is free although a permit is held');
      }

      try {
        await fs.mkdir(profileDir, { recursive: true });
        return await task(profileDir);
      } finally {
        // The most recently released profile is handed out next
        this.freeProfiles.unshift(profileDir);
      }
    });
  }

  private async runTool(
    command: string,
    args: string[],
    workspace: Workspace,
    timeoutMs: number,
  ): Promise<ExternalToolInvocation> {
    try {
      return await this.processRunner.run({
        tool: CONVERTER_TOOL,
        command,
        args,
        cwd: workspace.path,
        env: this.buildEnv(),
        timeoutMs,
      });
    } catch (error) {
      if (error instanceof ToolNotFoundError) {
        throw new ConversionFailedError(error.message, { tool: CONVERTER_TOOL, cause: error });
      }
      throw error;
    }
  }

  private async assertSourceReadable(sourcePath: string): Promise<void> {
    const size = await this.fileSize(sourcePath);
    if (size === null) {
      throw new ConversionFailedError(`source document not found: ${path.basename(sourcePath)}`, {
        tool: CONVERTER_TOOL,
      });
    }
    if (size === 0) {
      throw new ConversionFailedError('source document is empty', { tool: CONVERTER_TOOL });
    }
  }

  private buildArgs(sourcePath: string, workspace: Workspace, profileDir: string): string[] {
    return [
      '--headless',
      '--invisible',
      '--nologo',
      '--nodefault',
      '--norestore',
      '--nolockcheck',
      `-env:UserInstallation=${pathToFileURL(profileDir).href}`,
      '--convert-to',
      'pdf',
      '--outdir',
      workspace.path,
      sourcePath,
    ];
  }

  private buildEnv(): NodeJS.ProcessEnv {
    return {
      ...process.env,
      // Render without a display server
      SAL_USE_VCLPLUGIN: 'svp',
      LANG: this.config.locale,
      LC_ALL: this.config.locale,
    };
  }

  private async fileSize(filePath: string): Promise<number | null> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile() ? stats.size : null;
    } catch {
      return null;
    }
  }
}
