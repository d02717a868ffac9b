/**
 * REST API routes - health, deck state, PDF library listing.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { homedir } from 'os';
import { listPdfTree } from '../../library/pdf-browser.js';
import type { LiveDeck } from '../../session/live-deck.js';
import { sendError, sendJson } from '../utils.js';

export async function handleApiRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  live: LiveDeck,
): Promise<boolean> {
  if (req.method !== 'GET') return false;

  // Health check
  if (url.pathname === '/health') {
    sendJson(res, { status: 'ok', connections: live.center.getStats() });
    return true;
  }

  if (url.pathname === '/api/deck') {
    sendJson(res, {
      deck: live.deck.snapshot(),
      presentation: live.deck.sync.snapshot(),
      timer: { text: live.timer.text(), running: live.timer.state === 'running' },
    });
    return true;
  }

  // Folder tree for the organizer's file panel
  if (url.pathname === '/api/library') {
    const dir = url.searchParams.get('dir') || homedir();
    try {
      sendJson(res, { dir, entries: await listPdfTree(dir) });
    } catch (err) {
      console.error(`[api] Failed to list ${dir}:`, err);
      sendError(res, 'Failed to list folder');
    }
    return true;
  }

  return false;
}
