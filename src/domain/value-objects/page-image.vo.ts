import { imageExtension, type ImageFormat } from './conversion-options.vo';

/**
 * One rendered page. Immutable once the rasterizer has written it.
 */
export interface PageImage {
  readonly index: number;
  readonly filename: string;
  readonly format: ImageFormat;
  readonly dpi: number;
  readonly sizeBytes: number;
  readonly path: string;
}

/**
 * Matches rasterizer output such as `page-7.png` or `page-007.jpg`.
 */
const PAGE_FILE_PATTERN = /^page-(\d+)\.(png|jpg)$/;

export function pageFilename(index: number, format: ImageFormat): string {
  return `page-${index}.${imageExtension(format)}`;
}

export function parsePageIndex(filename: string): number | null {
  const match = PAGE_FILE_PATTERN.exec(filename);
  if (!match) return null;

  const index = parseInt(match[1], 10);
  return index > 0 ? index : null;
}

export function isPageFilename(filename: string): boolean {
  return parsePageIndex(filename) !== null;
}

/**
 * Sorts by page index, never by filename, so `page-10` follows `page-9`.
 */
export function sortPages<T extends { index: number }>(pages: readonly T[]): T[] {
  return [...pages].sort((a, b) => a.index - b.index);
}

/**
 * True when indices run 1..n in strictly increasing order.
 */
export function hasContiguousIndices(pages: readonly Pick<PageImage, 'index'>[]): boolean {
  return pages.every((page, position) => page.index === position + 1);
}

export function createPageImage(props: PageImage): PageImage {
  if (!Number.isInteger(props.index) || props.index < 1) {
    throw new Error(`Invalid page index: ${props.index}`);
  }
  if (props.sizeBytes <= 0) {
    throw new Error(`Page ${props.index} is empty`);
  }
  return Object.freeze({ ...props });
}
