/**
 * Server lifecycle - initialization, listening, shutdown.
 */

import type { Server } from 'http';
import type { WebSocketServer } from 'ws';
import { HOST, PORT } from './config.js';
import { DeckSession } from './deck/deck-session.js';
import { PopplerPdf } from './pdf/index.js';
import { LiveDeck } from './session/live-deck.js';
import { BroadcastCenter } from './websocket/index.js';

/**
 * Build the deck session and its broadcast plumbing, importing the PDFs
 * given on the command line.
 */
export async function initializeDeck(files: string[]): Promise<LiveDeck> {
  const pdf = new PopplerPdf();
  const live = new LiveDeck(new DeckSession(pdf, pdf), new BroadcastCenter());

  if (files.length > 0) {
    const { added, failures } = await live.deck.importFiles(files);
    console.log(`Imported ${added.length} slide(s) from ${files.length} file(s)`);
    for (const failure of failures) {
      console.error(`  ${failure.path}: ${failure.message}`);
    }
  }
  return live;
}

export function startListening(server: Server): void {
  server.listen(PORT, HOST, () => {
    console.log(`pdfdeck running at http://${HOST}:${PORT}`);
    console.log(`WebSocket endpoint: ws://${HOST}:${PORT}/ws`);
  });
}

export function shutdown(server: Server, wss: WebSocketServer, live: LiveDeck): void {
  console.log('\nShutting down...');
  live.stop();

  wss.close(() => {
    server.close(() => {
      process.exit(0);
    });
  });
  // Force exit after 2 seconds if graceful shutdown hangs
  setTimeout(() => process.exit(0), 2000).unref();
}
