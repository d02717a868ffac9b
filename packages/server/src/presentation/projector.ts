/**
 * Projector frame geometry and composition.
 *
 * A slide that fits the viewport is centered vertically. A taller slide
 * shows one viewport-high slice whose top is
 * (imageHeight - viewportHeight) * verticalOffset.
 */

import sharp from 'sharp';
import type { Size } from '@pdfdeck/shared';
import type { RenderedImage } from '../deck/image-cache.js';

export interface ProjectorFrame {
  /** The image is taller than the viewport and is being scrolled. */
  tall: boolean;
  sourceTop: number;
  sourceWidth: number;
  sourceHeight: number;
  destLeft: number;
  destTop: number;
}

export function clampOffset(offset: number): number {
  if (!Number.isFinite(offset)) return 0;
  return Math.min(Math.max(offset, 0), 1);
}

export function isTall(image: Size, viewport: Size): boolean {
  return image.height > viewport.height;
}

export function computeProjectorFrame(image: Size, viewport: Size, verticalOffset: number): ProjectorFrame {
  const sourceWidth = Math.min(image.width, viewport.width);
  const destLeft = Math.max(0, Math.floor((viewport.width - image.width) / 2));

  if (!isTall(image, viewport)) {
    return {
      tall: false,
      sourceTop: 0,
      sourceWidth,
      sourceHeight: image.height,
      destLeft,
      destTop: Math.floor((viewport.height - image.height) / 2),
    };
  }

  const maxOffset = image.height - viewport.height;
  return {
    tall: true,
    sourceTop: Math.round(maxOffset * clampOffset(verticalOffset)),
    sourceWidth,
    sourceHeight: viewport.height,
    destLeft,
    destTop: 0,
  };
}

/**
 * Compose the projector frame as a PNG of exactly `viewport` pixels on black.
 */
export async function renderProjectorFrame(
  image: RenderedImage,
  viewport: Size,
  verticalOffset: number,
): Promise<Buffer> {
  const frame = computeProjectorFrame(image, viewport, verticalOffset);
  const slice = await sharp(image.data)
    .extract({
      left: 0,
      top: frame.sourceTop,
      width: frame.sourceWidth,
      height: frame.sourceHeight,
    })
    .toBuffer();

  return sharp({
    create: {
      width: viewport.width,
      height: viewport.height,
      channels: 3,
      background: { r: 0, g: 0, b: 0 },
    },
  })
    .composite([{ input: slice, left: frame.destLeft, top: frame.destTop }])
    .png()
    .toBuffer();
}
