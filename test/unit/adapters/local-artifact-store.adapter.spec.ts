import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, stat, writeFile } from 'fs/promises';
import * as path from 'path';
import type { Readable } from 'stream';
import { ResourceError } from '../../../src/domain/errors/conversion.errors';
import { createPageImage, type PageImage } from '../../../src/domain/value-objects/page-image.vo';
import { LocalArtifactStoreAdapter } from '../../../src/infrastructure/adapters/storage/local-artifact-store.adapter';
import {
  createTempDir,
  createTestConfigService,
  createTestLogger,
  storageEnv,
  type TempDir,
} from '../helpers/test-config';

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('LocalArtifactStoreAdapter', () => {
  let tmp: TempDir;
  let outputDir: string;
  let scratch: string;
  let store: LocalArtifactStoreAdapter;

  const writePage = async (index: number, extension = 'png'): Promise<PageImage> => {
    const filename = `page-${index}.${extension}`;
    const filePath = path.join(scratch, filename);
    const content = `image ${index}`;
    await writeFile(filePath, content);
    return createPageImage({
      index,
      filename,
      format: extension === 'png' ? 'png' : 'jpeg',
      dpi: 150,
      sizeBytes: Buffer.byteLength(content),
      path: filePath,
    });
  };

  beforeEach(async () => {
    tmp = await createTempDir();
    scratch = path.join(tmp.path, 'scratch');
    await mkdir(scratch);
    const configService = createTestConfigService(storageEnv(tmp.path));
    outputDir = configService.get('storage.outputDir', { infer: true });
    store = new LocalArtifactStoreAdapter(configService, createTestLogger(configService));
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it('should move pages under the job directory', async () => {
    const pages = [await writePage(1), await writePage(2)];

    const stored = await store.persist('job-1', pages);

    expect(stored.map((page) => page.path)).toEqual([
      path.join(outputDir, 'job-1', 'page-1.png'),
      path.join(outputDir, 'job-1', 'page-2.png'),
    ]);
    expect(stored.map((page) => page.index)).toEqual([1, 2]);
    expect(await readFile(stored[1].path, 'utf8')).toBe('image 2');
    await expect(stat(pages[0].path)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('should wrap a missing page file in ResourceError', async () => {
    const page = await writePage(1);
    const missing = { ...page, path: path.join(scratch, 'gone.png') };

    await expect(store.persist('job-1', [missing])).rejects.toBeInstanceOf(ResourceError);
  });

  it('should open a stored page with its type and size', async () => {
    await store.persist('job-1', [await writePage(1, 'jpg')]);

    const artifact = await store.open('job-1', 'page-1.jpg');

    expect(artifact).not.toBeNull();
    expect(artifact?.contentType).toBe('image/jpeg');
    expect(artifact?.sizeBytes).toBe(7);
    if (artifact) {
      expect(await readAll(artifact.stream)).toBe('image 1');
    }
  });

  it('should return null for unknown or unsafe names', async () => {
    await store.persist('job-1', [await writePage(1)]);

    expect(await store.open('job-1', 'page-2.png')).toBeNull();
    expect(await store.open('job-2', 'page-1.png')).toBeNull();
    expect(await store.open('job-1', '../job-1/page-1.png')).toBeNull();
    expect(await store.open('..', 'page-1.png')).toBeNull();
  });

  it('should remove a job directory', async () => {
    await store.persist('job-1', [await writePage(1)]);

    await store.remove('job-1');

    expect(await store.open('job-1', 'page-1.png')).toBeNull();
    await expect(store.remove('job-1')).resolves.toBeUndefined();
  });
});
