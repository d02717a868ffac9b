/**
 * In-process stand-ins for the poppler backend.
 */

import type { Size } from '@pdfdeck/shared';
import type { ExportPage, PdfBackend, PdfDocumentHandle, PdfExporter } from '../pdf/index.js';

export const LETTER: Size = { width: 612, height: 792 };

export interface RenderCall {
  path: string;
  pageIndex: number;
  size: Size;
}

export class FakePdf implements PdfBackend, PdfExporter {
  readonly opened: string[] = [];
  readonly renders: RenderCall[] = [];
  readonly exports: { pages: ExportPage[]; outputPath: string }[] = [];
  exportFailure: Error | null = null;
  renderFailure: ((call: RenderCall) => Error | null) | null = null;
  private files: Map<string, Size[]> = new Map();

  addFile(path: string, pageCount: number, pageSize: Size = LETTER): this {
    this.files.set(path, Array.from({ length: pageCount }, () => ({ ...pageSize })));
    return this;
  }

  async open(path: string): Promise<PdfDocumentHandle> {
    this.opened.push(path);
    const pageSizes = this.files.get(path);
    if (!pageSizes) {
      throw new Error(`Not a PDF: ${path}`);
    }
    return { path, pageCount: pageSizes.length, pageSizes };
  }

  async render(document: PdfDocumentHandle, pageIndex: number, size: Size): Promise<Buffer> {
    const call: RenderCall = { path: document.path, pageIndex, size };
    const failure = this.renderFailure?.(call);
    if (failure) throw failure;
    this.renders.push(call);
    return Buffer.from(`${document.path}#${pageIndex}@${size.width}x${size.height}`);
  }

  async exportPages(pages: ExportPage[], outputPath: string): Promise<void> {
    if (this.exportFailure) throw this.exportFailure;
    this.exports.push({ pages, outputPath });
  }
}
