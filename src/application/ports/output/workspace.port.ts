/**
 * Scratch directory owned by exactly one job.
 */
export interface Workspace {
  readonly jobId: string;
  readonly path: string;
  /** Where the rasterizer writes its output. */
  readonly pagesDir: string;
}

/**
 * Workspace Port (Driven Port)
 * Creates and destroys per-job scratch directories
 */
export interface WorkspacePort {
  /**
   * Create a fresh, empty workspace for the job.
   * Fails with ResourceError when the directory cannot be created or already exists.
   */
  acquire(jobId: string): Promise<Workspace>;

  /**
   * Store the uploaded document as `source<extension>` and return its path.
   */
  writeSource(workspace: Workspace, extension: string, content: Buffer): Promise<string>;

  /**
   * Remove the workspace and everything in it. Never throws.
   */
  release(jobId: string): Promise<void>;

  exists(jobId: string): Promise<boolean>;
}
