import type { Readable } from 'stream';
import type { PageImage } from '../../../domain/value-objects/page-image.vo';

export interface StoredArtifact {
  stream: Readable;
  sizeBytes: number;
  contentType: string;
}

/**
 * Artifact Store Port (Driven Port)
 * Durable home of page images once their workspace is gone
 */
export interface ArtifactStorePort {
  /**
   * Move the images out of the workspace. Returns them with their new paths.
   */
  persist(jobId: string, pages: readonly PageImage[]): Promise<PageImage[]>;

  /**
   * Null when the job or file does not exist, or the name is not a page image.
   */
  open(jobId: string, filename: string): Promise<StoredArtifact | null>;

  remove(jobId: string): Promise<void>;
}
