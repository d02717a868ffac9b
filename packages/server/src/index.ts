/**
 * pdfdeck - present PDF slide decks with a synchronized projector view.
 *
 * Usage: pdfdeck [file.pdf ...]
 */

import { createHttpServer } from './http/index.js';
import { initializeDeck, shutdown, startListening } from './lifecycle.js';
import { createWebSocketServer } from './websocket/index.js';

async function startup(): Promise<void> {
  const live = await initializeDeck(process.argv.slice(2));
  const server = createHttpServer(live);
  const wss = createWebSocketServer(server, live);

  const handleShutdown = () => shutdown(server, wss, live);
  process.on('SIGINT', handleShutdown);
  process.on('SIGTERM', handleShutdown);

  startListening(server);
}

startup().catch((err: unknown) => {
  console.error('Failed to start pdfdeck:', err);
  process.exit(1);
});
