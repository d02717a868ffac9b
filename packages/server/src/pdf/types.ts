/**
 * Capabilities the deck needs from a PDF library.
 */

import type { Size } from '@pdfdeck/shared';

/** An opened document. Immutable once opened. */
export interface PdfDocumentHandle {
  path: string;
  pageCount: number;
  /** Page sizes in PDF points (1/72 inch), indexed by 0-based page. */
  pageSizes: Size[];
}

export interface PdfBackend {
  /** Rejects when the file is missing or not a readable PDF. */
  open(path: string): Promise<PdfDocumentHandle>;
  /** Render one page to a PNG of exactly `size` pixels. */
  render(document: PdfDocumentHandle, pageIndex: number, size: Size): Promise<Buffer>;
}

export interface ExportPage {
  path: string;
  pageIndex: number;
}

export interface PdfExporter {
  /** Write `pages`, in order, into a new PDF at `outputPath`. */
  exportPages(pages: ExportPage[], outputPath: string): Promise<void>;
}
