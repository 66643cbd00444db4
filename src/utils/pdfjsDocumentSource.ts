/**
 * Shared pdfjs-dist loading for extraction.
 *
 * Node runs the legacy build without a worker; standard font data is read
 * from the installed pdfjs-dist package so pages that use the standard 14
 * fonts still produce text content. pdfjs is imported on first use, so
 * callers that inject their own page source never load it.
 */

import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import type { PdfjsPageLike } from './elementExtractor';

export interface PageSource {
  readonly pageCount: number;
  /** 0-based */
  getPage(pageIndex: number): Promise<PdfjsPageLike>;
  close(): Promise<void>;
}

function pdfjsPackageDir(): string {
  const require = createRequire(import.meta.url);
  return dirname(require.resolve('pdfjs-dist/package.json'));
}

/** Base options to spread into every getDocument() call. */
export function pdfjsDocumentOptions() {
  const root = pdfjsPackageDir();
  return {
    standardFontDataUrl: `${join(root, 'standard_fonts')}/`,
    cMapUrl: `${join(root, 'cmaps')}/`,
    cMapPacked: true,
    disableFontFace: true,
    isEvalSupported: false,
    verbosity: 0,
  };
}

export async function openPdfjsDocument(data: Uint8Array): Promise<PageSource> {
  const { getDocument } = await import('pdfjs-dist/legacy/build/pdf.mjs');
  // pdfjs transfers the buffer it is given; keep the caller's bytes intact
  const pdf = await getDocument({ ...pdfjsDocumentOptions(), data: data.slice() }).promise;
  return {
    pageCount: pdf.numPages,
    getPage: pageIndex => pdf.getPage(pageIndex + 1),
    close: () => pdf.destroy(),
  };
}
