/**
 * DeckSession - The one context object for a presentation session.
 *
 * Owns the page registry, slide order, notes, image cache and the
 * presentation sync. Everything else gets read access through it.
 */

import { fileURLToPath } from 'url';
import type {
  DeckSnapshot,
  ImportFailure,
  Size,
  SlideId,
  SlideSummary,
} from '@pdfdeck/shared';
import { ExportError, LoadError, NotesError, UnknownSlideError, errorMessage } from '../errors.js';
import type { PdfBackend, PdfDocumentHandle, PdfExporter } from '../pdf/index.js';
import { PresentationSync, type PresentationSource } from '../presentation/sync.js';
import { ImageCache } from './image-cache.js';
import { NotesStore } from './notes-store.js';
import { PageRegistry } from './page-registry.js';
import { SlideOrder } from './slide-order.js';
import { SlideRenderer } from './slide-renderer.js';

export interface ImportResult {
  added: SlideId[];
  failures: ImportFailure[];
}

export interface DeckSessionOptions {
  thumbnailWidth?: number;
}

/** Accept plain paths as well as file:// URLs from drag-and-drop. */
export function toLocalPath(pathOrUrl: string): string {
  return pathOrUrl.startsWith('file://') ? fileURLToPath(pathOrUrl) : pathOrUrl;
}

export class DeckSession implements PresentationSource {
  readonly registry: PageRegistry;
  readonly order = new SlideOrder();
  readonly notes = new NotesStore();
  readonly images = new ImageCache();
  readonly renderer: SlideRenderer;
  readonly sync: PresentationSync;
  private file: string | null = null;

  constructor(
    backend: PdfBackend,
    private exporter: PdfExporter,
    options: DeckSessionOptions = {},
  ) {
    this.registry = new PageRegistry(backend);
    this.renderer = new SlideRenderer(backend, this.registry, this.images, options.thumbnailWidth);
    this.sync = new PresentationSync(this, (display) => this.renderFullImages(display));
  }

  /** First document imported; its sidecar holds the notes. */
  get currentFile(): string | null {
    return this.file;
  }

  // ── PresentationSource ────────────────────────────────────────────

  get length(): number {
    return this.order.length;
  }

  get currentPosition(): number {
    return this.order.currentPosition;
  }

  get currentSlide(): SlideId | null {
    return this.order.currentSlide;
  }

  setCurrent(position: number): boolean {
    return this.order.setCurrent(position);
  }

  fullImageSize(id: SlideId): Size | undefined {
    const image = this.images.get('full', id);
    return image ? { width: image.width, height: image.height } : undefined;
  }

  notesFor(id: SlideId): string {
    return this.notes.get(id);
  }

  // ── Import / organize ─────────────────────────────────────────────

  /**
   * Import every file in order. A file that fails to open is reported in
   * `failures` and the rest of the batch still goes in.
   */
  async importFiles(paths: string[]): Promise<ImportResult> {
    const result: ImportResult = { added: [], failures: [] };
    let lastImported: string | null = null;

    for (const raw of paths) {
      const path = toLocalPath(raw);
      let handle: PdfDocumentHandle;
      try {
        handle = await this.registry.registerDocument(path);
      } catch (err) {
        if (!(err instanceof LoadError)) throw err;
        console.error(`[DeckSession] ${err.message}`);
        result.failures.push({ path, message: err.message });
        continue;
      }

      if (this.file === null) {
        this.file = path;
        await this.loadNotes(path, result);
      }

      const ids = this.registry.addPages(handle, handle.pageCount);
      this.order.append(ids);
      result.added.push(...ids);
      lastImported = path;

      try {
        await this.renderer.renderThumbnails(ids);
      } catch (err) {
        console.error(`[DeckSession] Thumbnails for ${path} failed:`, err);
        result.failures.push({ path, message: `Thumbnails unavailable: ${errorMessage(err)}` });
      }
    }

    if (lastImported !== null) {
      console.log(`[DeckSession] Imported ${result.added.length} slide(s); deck has ${this.order.length}`);
      try {
        await this.sync.rerender();
      } catch (err) {
        console.error('[DeckSession] Full-size render after import failed:', err);
        result.failures.push({ path: lastImported, message: `Full-size images unavailable: ${errorMessage(err)}` });
      }
    }
    this.sync.refresh();
    return result;
  }

  removeSlide(position: number): boolean {
    const removed = this.order.delete(position);
    if (removed) this.sync.refresh();
    return removed;
  }

  moveSlide(from: number, to: number): boolean {
    const moved = this.order.move(from, to);
    if (moved) this.sync.refresh();
    return moved;
  }

  jumpTo(position: number): boolean {
    return this.sync.jumpTo(position);
  }

  // ── Notes ─────────────────────────────────────────────────────────

  /** Set the note of `slideId`, or of the current slide. */
  setNotes(text: string, slideId: SlideId | null = this.currentSlide): void {
    if (slideId === null) return;
    if (!this.registry.has(slideId)) {
      throw new UnknownSlideError(slideId);
    }
    this.notes.set(slideId, text);
    this.sync.refresh();
  }

  /** Returns false when there was nothing to save. */
  async saveNotes(): Promise<boolean> {
    return this.file === null ? this.notes.save() : this.notes.save(this.file);
  }

  // ── Export ────────────────────────────────────────────────────────

  /**
   * Write the slides, in presentation order, to a new PDF.
   * Never mutates the deck. Returns the number of pages written.
   */
  async exportPdf(outputPath: string): Promise<number> {
    const target = toLocalPath(outputPath);
    if (this.order.length === 0) {
      throw new ExportError(target, 'No slides to export');
    }

    const pages = this.order.toArray().map((id) => this.registry.source(id));
    try {
      await this.exporter.exportPages(pages, target);
    } catch (err) {
      throw new ExportError(target, err);
    }
    return pages.length;
  }

  // ── Views ─────────────────────────────────────────────────────────

  slides(): SlideSummary[] {
    return this.order.toArray().map((slideId, position) => ({
      slideId,
      position,
      source: this.registry.source(slideId),
      hasNotes: this.notes.get(slideId) !== '',
    }));
  }

  snapshot(): DeckSnapshot {
    return {
      currentFile: this.file,
      currentPosition: this.order.currentPosition,
      slides: this.slides(),
    };
  }

  private async renderFullImages(display: Size): Promise<void> {
    await this.renderer.renderFull(this.order.toArray(), display);
  }

  private async loadNotes(path: string, result: ImportResult): Promise<void> {
    try {
      await this.notes.load(path);
    } catch (err) {
      if (!(err instanceof NotesError)) throw err;
      console.error(`[DeckSession] ${err.message}`);
      result.failures.push({ path: err.path, message: err.message });
    }
  }
}
