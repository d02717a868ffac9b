/**
 * SlideRenderer - Fills the ImageCache through the PDF backend.
 *
 * Thumbnails are a fixed width for the organizer. Full-size images are
 * scaled to the width of the display the projector is on, so a page taller
 * than the display keeps its aspect ratio and becomes scrollable.
 */

import type { Size, SlideId } from '@pdfdeck/shared';
import { THUMBNAIL_WIDTH } from '../config.js';
import type { PdfBackend } from '../pdf/index.js';
import type { ImageCache, RenderedImage } from './image-cache.js';
import type { PageRegistry } from './page-registry.js';

/** Scale `page` to `width`, keeping its aspect ratio. */
export function fitToWidth(page: Size, width: number): Size {
  const scale = width / page.width;
  return {
    width,
    height: Math.max(1, Math.floor(page.height * scale)),
  };
}

export class SlideRenderer {
  constructor(
    private backend: PdfBackend,
    private registry: PageRegistry,
    private cache: ImageCache,
    private thumbnailWidth: number = THUMBNAIL_WIDTH,
  ) {}

  async renderThumbnails(ids: Iterable<SlideId>): Promise<void> {
    for (const id of ids) {
      this.cache.set('thumbnail', id, await this.renderOne(id, this.thumbnailWidth));
    }
  }

  /**
   * Render every slide in `ids` to the display width, replacing what was
   * there. Slides not in `ids` are dropped from the full-size cache. If any
   * page fails the previous full-size set stays in place.
   */
  async renderFull(ids: Iterable<SlideId>, display: Size): Promise<void> {
    const wanted = [...ids];
    console.log(`[SlideRenderer] Rendering ${wanted.length} slide(s) at width ${display.width}`);
    const rendered = new Map<SlideId, RenderedImage>();
    for (const id of wanted) {
      rendered.set(id, await this.renderOne(id, display.width));
    }
    this.cache.replace('full', rendered);
    console.log(`[SlideRenderer] ${this.cache.count('full')} full-size image(s) ready`);
  }

  private async renderOne(id: SlideId, width: number): Promise<RenderedImage> {
    const { document, pageIndex } = this.registry.resolve(id);
    const size = fitToWidth(document.pageSizes[pageIndex], width);
    const data = await this.backend.render(document, pageIndex, size);
    return { data, ...size };
  }
}
