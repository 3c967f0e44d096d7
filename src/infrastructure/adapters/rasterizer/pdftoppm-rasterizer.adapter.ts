import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import type {
  PageRasterizerPort,
  RasterizeProgressListener,
} from '../../../application/ports/output/page-rasterizer.port';
import type { Workspace } from '../../../application/ports/output/workspace.port';
import type { AppConfig } from '../../../config/configuration';
import {
  ConversionTimeoutError,
  RasterizationFailedError,
} from '../../../domain/errors/conversion.errors';
import {
  imageExtension,
  type ConversionOptions,
} from '../../../domain/value-objects/conversion-options.vo';
import {
  createPageImage,
  hasContiguousIndices,
  isPageFilename,
  pageFilename,
  parsePageIndex,
  sortPages,
  type PageImage,
} from '../../../domain/value-objects/page-image.vo';
import type { ExternalToolInvocation } from '../../../shared/interfaces/tool-invocation.interface';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import {
  ProcessRunnerService,
  ToolNotFoundError,
} from '../../../shared/process/process-runner.service';

export const RASTERIZER_TOOL = 'rasterizer';

/** Prefix handed to the tool; it appends `-<n>.<ext>`. */
const OUTPUT_PREFIX = 'page';

/** How often the output directory is counted while the tool runs. */
export const PROGRESS_POLL_INTERVAL_MS = 200;

interface RasterizedFile {
  name: string;
  index: number;
}

/**
 * Pdftoppm Rasterizer Adapter
 * Implements PageRasterizerPort with a single poppler invocation per document
 */
@Injectable()
export class PdftoppmRasterizerAdapter implements PageRasterizerPort {
  private readonly config: AppConfig['rasterizer'];
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(ConfigService) configService: ConfigService<AppConfig, true>,
    @Inject(ProcessRunnerService) private readonly processRunner: ProcessRunnerService,
    @Inject(PinoLoggerService) logger: PinoLoggerService,
  ) {
    this.config = configService.get('rasterizer', { infer: true });
    this.logger = logger.forContext(PdftoppmRasterizerAdapter.name);
  }

  async rasterize(
    pdfPath: string,
    workspace: Workspace,
    options: ConversionOptions,
    timeoutMs: number,
    onProgress?: RasterizeProgressListener,
  ): Promise<PageImage[]> {
    const logger = this.logger.withJobId(workspace.jobId);
    const progress = this.watchProgress(workspace, options, onProgress);

    logger.info({ pdfPath, dpi: options.dpi, format: options.format }, 'Rasterizing pages');
    const invocation = await this.runTool(
      this.buildArgs(pdfPath, workspace, options),
      workspace,
      timeoutMs,
    ).finally(() => progress.stop());

    if (invocation.timedOut) {
      throw new ConversionTimeoutError(RASTERIZER_TOOL, timeoutMs, invocation.stderr);
    }

    if (invocation.exitCode !== 0) {
      const status =
        invocation.exitCode === null
          ? `was terminated by ${invocation.signal ?? 'a signal'}`
          : `exited with code ${invocation.exitCode}`;
      throw new RasterizationFailedError(`Page rasterizer ${status}`, {
        tool: RASTERIZER_TOOL,
        exitCode: invocation.exitCode,
        stderr: invocation.stderr,
      });
    }

    const files = await this.collectOutput(workspace, options);
    const pages: PageImage[] = [];

    for (const file of files) {
      pages.push(await this.finalizePage(workspace, file, options));
    }
    progress.report(pages.length);

    logger.info(
      { pageCount: pages.length, durationMs: invocation.durationMs },
      'Pages rasterized',
    );

    return pages;
  }

  private async runTool(
    args: string[],
    workspace: Workspace,
    timeoutMs: number,
  ): Promise<ExternalToolInvocation> {
    try {
      return await this.processRunner.run({
        tool: RASTERIZER_TOOL,
        command: this.config.command,
        args,
        cwd: workspace.path,
        timeoutMs,
      });
    } catch (error) {
      if (error instanceof ToolNotFoundError) {
        throw new RasterizationFailedError(error.message, { tool: RASTERIZER_TOOL, cause: error });
      }
      throw error;
    }
  }

  buildArgs(pdfPath: string, workspace: Workspace, options: ConversionOptions): string[] {
    const args = ['-r', String(options.dpi)];

    if (options.format === 'jpeg') {
      args.push('-jpeg', '-jpegopt', `quality=${this.config.jpegQuality}`);
    } else {
      args.push('-png');
    }

    if (options.width !== undefined || options.height !== undefined) {
      // -1 keeps the aspect ratio for the side that was not given
      args.push(
        '-scale-to-x',
        String(options.width ?? -1),
        '-scale-to-y',
        String(options.height ?? -1),
      );
    }

    args.push(pdfPath, path.join(workspace.pagesDir, OUTPUT_PREFIX));
    return args;
  }

  /**
   * Counts page files in the output directory while the tool runs and
   * forwards increases to the listener.
   */
  private watchProgress(
    workspace: Workspace,
    options: ConversionOptions,
    onProgress?: RasterizeProgressListener,
  ): { stop: () => void; report: (count: number) => void } {
    let reported = 0;
    let stopped = false;
    let counting = false;

    const report = (count: number) => {
      if (onProgress && count > reported) {
        reported = count;
        onProgress(count);
      }
    };

    if (!onProgress) {
      return { stop: () => undefined, report };
    }

    const extension = `.${imageExtension(options.format)}`;
    const timer = setInterval(() => {
      if (counting) return;
      counting = true;

      fs.readdir(workspace.pagesDir)
        .then((names) => {
          if (stopped) return;
          report(names.filter((name) => isPageFilename(name) && name.endsWith(extension)).length);
        })
        .catch((error: unknown) => {
          this.logger.debug(
            {
              jobId: workspace.jobId,
              error: error instanceof Error ? error.message : String(error),
            },
            'Could not count rasterized pages',
          );
        })
        .finally(() => {
          counting = false;
        });
    }, PROGRESS_POLL_INTERVAL_MS);
    timer.unref();

    return {
      stop: () => {
        stopped = true;
        clearInterval(timer);
      },
      report,
    };
  }

  /**
   * The tool zero-pads page numbers to the width of the page count, so
   * ordering goes by the parsed number rather than the name.
   */
  private async collectOutput(
    workspace: Workspace,
    options: ConversionOptions,
  ): Promise<RasterizedFile[]> {
    const extension = `.${imageExtension(options.format)}`;
    const names = await fs.readdir(workspace.pagesDir);

    const files: RasterizedFile[] = [];
    for (const name of names) {
      const index = parsePageIndex(name);
      if (index !== null && name.endsWith(extension)) {
        files.push({ name, index });
      }
    }

    if (files.length === 0) {
      throw new RasterizationFailedError('Page rasterizer produced no pages', {
        tool: RASTERIZER_TOOL,
      });
    }

    const sorted = sortPages(files);
    if (!hasContiguousIndices(sorted)) {
      throw new RasterizationFailedError(
        `Page rasterizer output is not contiguous: got pages ${sorted.map((file) => file.index).join(', ')}`,
        { tool: RASTERIZER_TOOL },
      );
    }

    return sorted;
  }

  private async finalizePage(
    workspace: Workspace,
    file: RasterizedFile,
    options: ConversionOptions,
  ): Promise<PageImage> {
    const filename = pageFilename(file.index, options.format);
    const source = path.join(workspace.pagesDir, file.name);
    const target = path.join(workspace.pagesDir, filename);

    const stats = await fs.stat(source);
    if (stats.size === 0) {
      throw new RasterizationFailedError(`Page ${file.index} is empty`, { tool: RASTERIZER_TOOL });
    }

    if (source !== target) {
      await fs.rename(source, target);
    }

    return createPageImage({
      index: file.index,
      filename,
      format: options.format,
      dpi: options.dpi,
      sizeBytes: stats.size,
      path: target,
    });
  }
}
