/**
 * Server configuration - constants, ports, render sizes.
 */

import type { Size } from '@pdfdeck/shared';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

export const PORT = intFromEnv('PORT', 8400);

export const HOST = process.env.PDFDECK_HOST ?? '127.0.0.1';

/**
 * Directory holding the poppler binaries.
 * Undefined lets node-poppler find them on its own.
 */
export function getPopplerPath(): string | undefined {
  return process.env.PDFDECK_POPPLER_PATH || undefined;
}

/** Width of the organizer thumbnails, in pixels. */
export const THUMBNAIL_WIDTH = intFromEnv('PDFDECK_THUMBNAIL_WIDTH', 200);

/** Used as the display size when the projector has not reported one. */
export const DEFAULT_DISPLAY_SIZE: Size = {
  width: intFromEnv('PDFDECK_DISPLAY_WIDTH', 1920),
  height: intFromEnv('PDFDECK_DISPLAY_HEIGHT', 1080),
};

export const TIMER_INTERVAL_MS = intFromEnv('TIMER_INTERVAL_MS', 500);

export const NOTES_SUFFIX = '.notes';

export const NOTES_MARKER = '==XXslide';

export const PNG_MIME = 'image/png';
