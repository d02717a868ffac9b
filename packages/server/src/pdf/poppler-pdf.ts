/**
 * PDF rendering and export using node-poppler.
 *
 * pdfinfo gives page count and page sizes, pdftocairo renders a page to PNG,
 * and pdfseparate + pdfunite materialise a slide order into a new document.
 */

import { Poppler } from 'node-poppler';
import { join } from 'path';
import { tmpdir } from 'os';
import { readdir, readFile, rm, mkdir } from 'fs/promises';
import { randomUUID } from 'crypto';
import type { Size } from '@pdfdeck/shared';
import { getPopplerPath } from '../config.js';
import type { ExportPage, PdfBackend, PdfDocumentHandle, PdfExporter } from './types.js';

export interface PdfInfo {
  pageCount: number;
  pageSizes: Size[];
}

/**
 * Parse `pdfinfo -f 1 -l N` output.
 * Pages rotated by 90/270 degrees report their size unrotated, so swap them.
 */
export function parsePdfInfo(output: string): PdfInfo {
  const pagesMatch = output.match(/^Pages:\s*(\d+)/m);
  const pageCount = pagesMatch ? parseInt(pagesMatch[1], 10) : 0;

  const sizes = new Map<number, Size>();
  for (const match of output.matchAll(/^Page\s+(\d+)\s+size:\s*([\d.]+)\s*x\s*([\d.]+)/gm)) {
    sizes.set(parseInt(match[1], 10), {
      width: parseFloat(match[2]),
      height: parseFloat(match[3]),
    });
  }
  for (const match of output.matchAll(/^Page\s+(\d+)\s+rot:\s*(\d+)/gm)) {
    const page = parseInt(match[1], 10);
    const size = sizes.get(page);
    const rotation = parseInt(match[2], 10) % 180;
    if (size && rotation === 90) {
      sizes.set(page, { width: size.height, height: size.width });
    }
  }

  // Documents without per-page lines share one "Page size:" line
  const sharedMatch = output.match(/^Page size:\s*([\d.]+)\s*x\s*([\d.]+)/m);
  const shared: Size | undefined = sharedMatch
    ? { width: parseFloat(sharedMatch[1]), height: parseFloat(sharedMatch[2]) }
    : undefined;

  const pageSizes: Size[] = [];
  for (let page = 1; page <= pageCount; page++) {
    const size = sizes.get(page) ?? shared;
    if (!size) {
      throw new Error(`pdfinfo reported no size for page ${page}`);
    }
    pageSizes.push(size);
  }
  return { pageCount, pageSizes };
}

function infoToText(info: unknown): string {
  // pdfInfo returns a string or object, handle both
  return typeof info === 'string' ? info : JSON.stringify(info);
}

async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const tempDir = join(tmpdir(), `pdfdeck-${randomUUID()}`);
  await mkdir(tempDir, { recursive: true });
  try {
    return await fn(tempDir);
  } finally {
    await rm(tempDir, { recursive: true, force: true }).catch((err: unknown) => {
      console.warn(`[poppler] Failed to remove temp dir ${tempDir}:`, err);
    });
  }
}

export class PopplerPdf implements PdfBackend, PdfExporter {
  private poppler: Poppler;

  constructor(binPath: string | undefined = getPopplerPath()) {
    this.poppler = new Poppler(binPath);
  }

  async open(path: string): Promise<PdfDocumentHandle> {
    const summary = parsePdfInfo(infoToText(await this.poppler.pdfInfo(path)));
    if (summary.pageCount === 0) {
      throw new Error('Document has no pages');
    }

    const detailed = infoToText(
      await this.poppler.pdfInfo(path, {
        firstPageToConvert: 1,
        lastPageToConvert: summary.pageCount,
      }),
    );
    const { pageCount, pageSizes } = parsePdfInfo(detailed);
    return { path, pageCount, pageSizes };
  }

  async render(document: PdfDocumentHandle, pageIndex: number, size: Size): Promise<Buffer> {
    const pageNumber = pageIndex + 1;
    return withTempDir(async (tempDir) => {
      await this.poppler.pdfToCairo(document.path, join(tempDir, 'page'), {
        pngFile: true,
        singleFile: true,
        firstPageToConvert: pageNumber,
        lastPageToConvert: pageNumber,
        scalePageToXAxis: size.width,
        scalePageToYAxis: size.height,
      });

      const files = await readdir(tempDir);
      const pngFile = files.find((f) => f.endsWith('.png'));
      if (!pngFile) {
        throw new Error(`Failed to render page ${pageNumber} of ${document.path}`);
      }
      return readFile(join(tempDir, pngFile));
    });
  }

  async exportPages(pages: ExportPage[], outputPath: string): Promise<void> {
    await withTempDir(async (tempDir) => {
      const parts: string[] = [];
      for (let i = 0; i < pages.length; i++) {
        const { path, pageIndex } = pages[i];
        const pageNumber = pageIndex + 1;
        // pdfseparate substitutes %d with the page number
        await this.poppler.pdfSeparate(path, join(tempDir, `part-${i}-%d.pdf`), {
          firstPageToExtract: pageNumber,
          lastPageToExtract: pageNumber,
        });
        parts.push(join(tempDir, `part-${i}-${pageNumber}.pdf`));
      }
      await this.poppler.pdfUnite(parts, outputPath);
    });
    console.log(`[poppler] Wrote ${pages.length} page(s) to ${outputPath}`);
  }
}
