/**
 * Image routes - slide thumbnails, full-size slides, the projector frame.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import type { ImageKind } from '../../deck/image-cache.js';
import { renderProjectorFrame } from '../../presentation/projector.js';
import type { LiveDeck } from '../../session/live-deck.js';
import { sendError, sendPng } from '../utils.js';

const SLIDE_IMAGE = /^\/slides\/(\d+)\/(thumbnail|full)\.png$/;

function isImageKind(value: string): value is ImageKind {
  return value === 'thumbnail' || value === 'full';
}

export async function handleSlideRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  live: LiveDeck,
): Promise<boolean> {
  if (req.method !== 'GET') return false;

  const match = url.pathname.match(SLIDE_IMAGE);
  if (match && isImageKind(match[2])) {
    const image = live.deck.images.get(match[2], parseInt(match[1], 10));
    if (!image) {
      sendError(res, 'Image not rendered', 404);
    } else {
      sendPng(res, image.data);
    }
    return true;
  }

  if (url.pathname === '/projector/frame.png') {
    const { deck } = live;
    const slideId = deck.currentSlide;
    const image = slideId === null ? undefined : deck.images.get('full', slideId);
    if (!image) {
      sendError(res, 'No slide to project', 404);
      return true;
    }
    try {
      sendPng(res, await renderProjectorFrame(image, deck.sync.projectorViewport, deck.sync.offset));
    } catch (err) {
      console.error('[slides] Failed to compose projector frame:', err);
      sendError(res, 'Failed to compose projector frame');
    }
    return true;
  }

  return false;
}
