/**
 * PresentationSync - Keeps the presenter and projector views in lock-step.
 *
 * Both views always show the same slide position and vertical offset.
 * next()/previous() are two-phase on a slide taller than the projector:
 * the first press scrolls to the bottom (or top), the second changes slide.
 */

import type { PresentationSnapshot, Size, SlideId } from '@pdfdeck/shared';
import { DEFAULT_DISPLAY_SIZE } from '../config.js';
import { clampOffset, isTall } from './projector.js';

/** What the sync needs to know about the deck. */
export interface PresentationSource {
  readonly length: number;
  readonly currentPosition: number;
  readonly currentSlide: SlideId | null;
  setCurrent(position: number): boolean;
  /** Size of the full-size rendering of a slide, if rendered. */
  fullImageSize(id: SlideId): Size | undefined;
  notesFor(id: SlideId): string;
}

export interface SlideView {
  show(state: PresentationSnapshot): void;
}

export type Navigation = 'scroll' | 'slide';

export type FullRenderer = (display: Size) => Promise<void>;

export class PresentationSync {
  private views: Set<SlideView> = new Set();
  private verticalOffset = 0;
  private viewport: Size = DEFAULT_DISPLAY_SIZE;
  private presenting = false;
  private imageRevision = 0;
  private display: Size | null = null;
  private shownSlide: SlideId | null;

  constructor(
    private source: PresentationSource,
    private renderFull: FullRenderer,
  ) {
    this.shownSlide = source.currentSlide;
  }

  get offset(): number {
    return this.verticalOffset;
  }

  get projectorViewport(): Size {
    return this.viewport;
  }

  get isPresenting(): boolean {
    return this.presenting;
  }

  addView(view: SlideView): () => void {
    this.views.add(view);
    view.show(this.snapshot());
    return () => {
      this.views.delete(view);
    };
  }

  snapshot(): PresentationSnapshot {
    const slideId = this.source.currentSlide;
    return {
      presenting: this.presenting,
      position: this.source.currentPosition,
      slideId,
      verticalOffset: this.verticalOffset,
      notes: slideId === null ? '' : this.source.notesFor(slideId),
      imageRevision: this.imageRevision,
    };
  }

  jumpTo(position: number): boolean {
    if (!this.source.setCurrent(position)) {
      return false;
    }
    this.verticalOffset = 0;
    this.sync();
    return true;
  }

  next(): Navigation | null {
    if (this.currentIsTall() && this.verticalOffset < 1) {
      this.verticalOffset = 1;
      this.sync();
      return 'scroll';
    }
    if (!this.source.setCurrent(this.source.currentPosition + 1)) {
      return null;
    }
    this.verticalOffset = 0;
    this.sync();
    return 'slide';
  }

  previous(): Navigation | null {
    if (this.currentIsTall() && this.verticalOffset > 0) {
      this.verticalOffset = 0;
      this.sync();
      return 'scroll';
    }
    if (!this.source.setCurrent(this.source.currentPosition - 1)) {
      return null;
    }
    this.verticalOffset = 0;
    this.sync();
    return 'slide';
  }

  /** Scroll within a tall slide. Ignored for slides that fit. */
  setOffset(offset: number): void {
    if (!this.currentIsTall()) return;
    this.verticalOffset = clampOffset(offset);
    this.sync();
  }

  /** The projector window reported its size. */
  setViewport(viewport: Size): void {
    this.viewport = viewport;
    if (!this.currentIsTall()) {
      this.verticalOffset = 0;
    }
    this.sync();
  }

  /**
   * Render the full-size images for `display` and show the current slide.
   * Without a display size the projector viewport is used.
   */
  async enterPresentation(display?: Size): Promise<void> {
    this.display = display ?? this.viewport;
    await this.renderFull(this.display);
    this.imageRevision++;
    this.presenting = true;
    this.verticalOffset = 0;
    this.sync();
  }

  /** Re-render the full-size images after slides were added mid-presentation. */
  async rerender(): Promise<void> {
    if (!this.presenting || !this.display) return;
    await this.renderFull(this.display);
    this.imageRevision++;
    this.refresh();
  }

  exitPresentation(): void {
    if (!this.presenting) return;
    this.presenting = false;
    this.sync();
  }

  /**
   * Re-sync after the deck changed underneath (move, delete, import, notes).
   * The offset only survives if the same slide is still current.
   */
  refresh(): void {
    if (this.source.currentSlide !== this.shownSlide) {
      this.verticalOffset = 0;
    }
    this.sync();
  }

  private currentIsTall(): boolean {
    const slideId = this.source.currentSlide;
    if (slideId === null) return false;
    const size = this.source.fullImageSize(slideId);
    return size !== undefined && isTall(size, this.viewport);
  }

  private sync(): void {
    this.shownSlide = this.source.currentSlide;
    const state = this.snapshot();
    for (const view of this.views) {
      view.show(state);
    }
  }
}
