import type { Workspace } from './workspace.port';

/**
 * Document Converter Port (Driven Port)
 * Turns a presentation into an intermediate PDF inside the workspace
 */
export interface DocumentConverterPort {
  /**
   * Returns the path of the PDF written into the workspace.
   * Fails with ConversionFailedError or ConversionTimeoutError.
   */
  convert(sourcePath: string, workspace: Workspace, timeoutMs: number): Promise<string>;
}
