/**
 * BroadcastCenter - Routes server events to the connected views.
 *
 * Each connection declares its role (presenter, projector, organizer) with
 * HELLO. Deck and presentation state go to everyone so the presenter and
 * projector never drift apart; replies go to the requesting connection.
 */

import { randomUUID } from 'crypto';
import type { WebSocket } from 'ws';
import type { ServerEvent, ViewRole } from '@pdfdeck/shared';

export type ConnectionId = string;

/** The part of a WebSocket the center uses. */
export type EventSocket = Pick<WebSocket, 'readyState' | 'OPEN' | 'send'>;

interface ConnectionEntry {
  ws: EventSocket;
  role: ViewRole | null;
}

export function generateConnectionId(): ConnectionId {
  return `conn-${randomUUID().slice(0, 8)}`;
}

export class BroadcastCenter {
  private connections: Map<ConnectionId, ConnectionEntry> = new Map();

  /**
   * Register a WebSocket connection. Its role is unknown until HELLO.
   */
  subscribe(connectionId: ConnectionId, ws: EventSocket): void {
    this.connections.set(connectionId, { ws, role: null });
    console.log(`[BroadcastCenter] Connection subscribed: ${connectionId}`);
  }

  unsubscribe(connectionId: ConnectionId): void {
    this.connections.delete(connectionId);
    console.log(`[BroadcastCenter] Connection unsubscribed: ${connectionId}`);
  }

  setRole(connectionId: ConnectionId, role: ViewRole): boolean {
    const entry = this.connections.get(connectionId);
    if (!entry) return false;
    entry.role = role;
    console.log(`[BroadcastCenter] Connection ${connectionId} is a ${role} view`);
    return true;
  }

  getRole(connectionId: ConnectionId): ViewRole | null {
    return this.connections.get(connectionId)?.role ?? null;
  }

  /**
   * Publish an event directly to a single connection.
   * Returns true if the event was sent successfully.
   */
  publishToConnection(event: ServerEvent, connectionId: ConnectionId): boolean {
    const entry = this.connections.get(connectionId);
    if (!entry || entry.ws.readyState !== entry.ws.OPEN) {
      console.warn(`[BroadcastCenter] Connection not available: ${connectionId}`);
      return false;
    }

    try {
      entry.ws.send(JSON.stringify(event));
      return true;
    } catch (err) {
      console.error(`[BroadcastCenter] Failed to send event to ${connectionId}:`, err);
      return false;
    }
  }

  /**
   * Publish an event to every connection with the given role.
   * Returns the number of connections that received the event.
   */
  publishToRole(role: ViewRole, event: ServerEvent): number {
    return this.send(event, (entry) => entry.role === role);
  }

  /**
   * Broadcast an event to all open connections.
   * Returns the number of connections that received the event.
   */
  broadcast(event: ServerEvent): number {
    return this.send(event, () => true);
  }

  getStats(): { connectionCount: number; roles: Record<ViewRole, number> } {
    const roles: Record<ViewRole, number> = { presenter: 0, projector: 0, organizer: 0 };
    for (const entry of this.connections.values()) {
      if (entry.role) roles[entry.role]++;
    }
    return { connectionCount: this.connections.size, roles };
  }

  /**
   * Clear all connections (on shutdown).
   */
  clear(): void {
    this.connections.clear();
  }

  private send(event: ServerEvent, accept: (entry: ConnectionEntry) => boolean): number {
    let count = 0;
    const data = JSON.stringify(event);
    for (const [connectionId, entry] of this.connections) {
      if (entry.ws.readyState !== entry.ws.OPEN || !accept(entry)) continue;
      try {
        entry.ws.send(data);
        count++;
      } catch (err) {
        console.error(`[BroadcastCenter] Failed to send event to ${connectionId}:`, err);
      }
    }
    return count;
  }
}
