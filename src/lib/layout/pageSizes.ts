import { PageSizes } from 'pdf-lib';
import { DocumentError, DocumentErrorCode } from '../errors/DocumentError';
import { Size } from '../types';

export const DEFAULT_PAGE_SIZE_NAME = 'A4';

/**
 * Look up a standard page size (A0-A10, B0-B10, Letter, Legal, ...) by name,
 * ignoring case. Dimensions are in points, portrait.
 */
export function lookupPageSize(name: string | undefined): Size {
  if (name) {
    const wanted = name.toUpperCase();
    for (const [sizeName, [width, height]] of Object.entries(PageSizes)) {
      if (sizeName.toUpperCase() === wanted) {
        return { width, height };
      }
    }
  }
  throw new DocumentError(
    `Unknown page size: ${name ?? '(none)'}`,
    DocumentErrorCode.LOOKUP_FAILURE,
    { name }
  );
}

/**
 * Swap width and height for landscape pages.
 */
export function orient(size: Size, landscape: boolean): Size {
  return landscape ? { width: size.height, height: size.width } : { ...size };
}

export function listPageSizeNames(): string[] {
  return Object.keys(PageSizes);
}
