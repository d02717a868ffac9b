/**
 * HTTP server factory - CORS, route dispatch.
 */

import { createServer, type Server } from 'http';
import { PORT } from '../config.js';
import type { LiveDeck } from '../session/live-deck.js';
import { handleApiRoutes, handleSlideRoutes } from './routes/index.js';
import { sendError, sendJson } from './utils.js';

const ALLOWED_ORIGINS = ['http://localhost:5173', 'http://localhost:3000'];

export function createHttpServer(live: LiveDeck): Server {
  return createServer((req, res) => {
    const origin = req.headers.origin;
    if (origin && ALLOWED_ORIGINS.includes(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    }

    // Handle preflight
    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', `http://localhost:${PORT}`);

    // Route dispatch - short-circuit on first match
    const dispatch = async () => {
      if (await handleApiRoutes(req, res, url, live)) return;
      if (await handleSlideRoutes(req, res, url, live)) return;
      sendJson(res, { error: 'Not found' }, 404);
    };

    dispatch().catch((err: unknown) => {
      console.error(`[http] ${req.method} ${url.pathname} failed:`, err);
      if (!res.headersSent) sendError(res, 'Internal error');
    });
  });
}
