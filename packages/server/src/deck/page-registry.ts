/**
 * PageRegistry - Maps global slide ids to (document, page index).
 *
 * Documents are cached by path so the same file is never opened twice.
 * Ids are handed out in import order across every document in the session
 * and are never reused or remapped.
 */

import type { SlideId, SlideSource } from '@pdfdeck/shared';
import { LoadError, UnknownSlideError } from '../errors.js';
import type { PdfBackend, PdfDocumentHandle } from '../pdf/index.js';

export interface ResolvedSlide {
  document: PdfDocumentHandle;
  pageIndex: number;
}

export class PageRegistry {
  private documentsByPath: Map<string, PdfDocumentHandle> = new Map();
  private slides: Map<SlideId, ResolvedSlide> = new Map();
  private maxId = -1;

  constructor(private backend: PdfBackend) {}

  get size(): number {
    return this.slides.size;
  }

  /**
   * Open a document, or return the cached handle for a path already loaded.
   * Throws LoadError if the backend cannot open it.
   */
  async registerDocument(path: string): Promise<PdfDocumentHandle> {
    const cached = this.documentsByPath.get(path);
    if (cached) return cached;

    let document: PdfDocumentHandle;
    try {
      document = await this.backend.open(path);
    } catch (err) {
      throw new LoadError(path, err);
    }
    this.documentsByPath.set(path, document);
    console.log(`[PageRegistry] Loaded ${path} (${document.pageCount} pages)`);
    return document;
  }

  /**
   * Allocate `count` new ids for pages 0..count-1 of `document`.
   */
  addPages(document: PdfDocumentHandle, count: number = document.pageCount): SlideId[] {
    const ids: SlideId[] = [];
    for (let pageIndex = 0; pageIndex < count; pageIndex++) {
      const id = ++this.maxId;
      this.slides.set(id, { document, pageIndex });
      ids.push(id);
    }
    return ids;
  }

  has(id: SlideId): boolean {
    return this.slides.has(id);
  }

  resolve(id: SlideId): ResolvedSlide {
    const slide = this.slides.get(id);
    if (!slide) {
      throw new UnknownSlideError(id);
    }
    return slide;
  }

  source(id: SlideId): SlideSource {
    const { document, pageIndex } = this.resolve(id);
    return { path: document.path, pageIndex };
  }
}
