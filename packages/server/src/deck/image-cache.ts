/**
 * ImageCache - Rendered slide bitmaps per resolution.
 *
 * Re-rendering a slide replaces its entry, so repeating a render (window
 * resize, re-entering presentation) never accumulates stale buffers.
 */

import type { Size, SlideId } from '@pdfdeck/shared';

export type ImageKind = 'thumbnail' | 'full';

export interface RenderedImage extends Size {
  data: Buffer;
}

export class ImageCache {
  private images: Record<ImageKind, Map<SlideId, RenderedImage>> = {
    thumbnail: new Map(),
    full: new Map(),
  };

  get(kind: ImageKind, id: SlideId): RenderedImage | undefined {
    return this.images[kind].get(id);
  }

  set(kind: ImageKind, id: SlideId, image: RenderedImage): void {
    this.images[kind].set(id, image);
  }

  /** Swap in a complete set for `kind`, dropping every entry not in it. */
  replace(kind: ImageKind, images: Map<SlideId, RenderedImage>): void {
    this.images[kind] = new Map(images);
  }

  count(kind: ImageKind): number {
    return this.images[kind].size;
  }
}
