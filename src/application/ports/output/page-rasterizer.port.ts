import type { ConversionOptions } from '../../../domain/value-objects/conversion-options.vo';
import type { PageImage } from '../../../domain/value-objects/page-image.vo';
import type { Workspace } from './workspace.port';

/**
 * Called with the number of page files written so far; counts only grow.
 */
export type RasterizeProgressListener = (pagesRendered: number) => void;

/**
 * Page Rasterizer Port (Driven Port)
 * Renders every page of a PDF to an image file
 */
export interface PageRasterizerPort {
  /**
   * Pages come back ordered by index, starting at 1, with paths still inside
   * the workspace. Fails with RasterizationFailedError or ConversionTimeoutError.
   */
  rasterize(
    pdfPath: string,
    workspace: Workspace,
    options: ConversionOptions,
    timeoutMs: number,
    onProgress?: RasterizeProgressListener,
  ): Promise<PageImage[]>;
}
