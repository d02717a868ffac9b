/**
 * WebSocket server factory.
 *
 * Every view connects to /ws, introduces itself with HELLO and receives a
 * snapshot of the deck, the presentation state and the timer.
 */

import type { Server } from 'http';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { ServerEventType, parseClientEvent } from '@pdfdeck/shared';
import type { LiveDeck } from '../session/live-deck.js';
import { generateConnectionId } from './broadcast-center.js';

function rawToText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

/** Decode and validate one incoming frame. */
export function decodeClientMessage(data: RawData): ReturnType<typeof parseClientEvent> {
  let raw: unknown;
  try {
    raw = JSON.parse(rawToText(data));
  } catch {
    return { success: false, error: 'Message is not valid JSON' };
  }
  return parseClientEvent(raw);
}

export function createWebSocketServer(httpServer: Server, live: LiveDeck): WebSocketServer {
  const wss = new WebSocketServer({ server: httpServer, path: '/ws' });

  wss.on('connection', (ws: WebSocket) => {
    const connectionId = generateConnectionId();
    live.addConnection(connectionId, ws);
    console.log(`[WebSocket] Client connected: ${connectionId}`);

    ws.on('message', (data) => {
      const parsed = decodeClientMessage(data);
      if (!parsed.success) {
        console.warn(`[WebSocket] Rejected message from ${connectionId}: ${parsed.error}`);
        ws.send(JSON.stringify({ type: ServerEventType.ERROR, title: 'Invalid message', error: parsed.error }));
        return;
      }
      live.handle(parsed.event, connectionId).catch((err: unknown) => {
        console.error('[WebSocket] Failed to process message:', err);
      });
    });

    ws.on('close', () => {
      console.log(`[WebSocket] Client disconnected: ${connectionId}`);
      live.removeConnection(connectionId);
    });

    ws.on('error', (err) => {
      console.error('[WebSocket] Error:', err);
    });
  });

  return wss;
}
