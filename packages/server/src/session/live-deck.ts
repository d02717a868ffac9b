/**
 * LiveDeck - Connects the deck session to the WebSocket views.
 *
 * Client events from any view mutate the one DeckSession; the resulting
 * state is broadcast so the presenter, projector and organizer all agree.
 * Long-running work (import, export, full-size rendering) is serialised so
 * overlapping requests never interleave their slide id allocation.
 */

import {
  ServerEventType,
  type ClientEvent,
  type PresentationSnapshot,
  type ServerEvent,
  type ViewRole,
} from '@pdfdeck/shared';
import type { DeckSession } from '../deck/deck-session.js';
import { DeckError, errorMessage } from '../errors.js';
import { PauseableTimer, type PauseableTimerOptions } from '../presentation/timer.js';
import type { SlideView } from '../presentation/sync.js';
import type { BroadcastCenter, ConnectionId, EventSocket } from '../websocket/broadcast-center.js';

/** Forwards presentation state to every connection of one role. */
class RoleView implements SlideView {
  constructor(private role: ViewRole, private center: BroadcastCenter) {}

  show(state: PresentationSnapshot): void {
    this.center.publishToRole(this.role, { type: ServerEventType.PRESENTATION_STATE, state });
  }
}

export class LiveDeck {
  readonly timer: PauseableTimer;
  private queue: Promise<void> = Promise.resolve();
  private detachViews: (() => void)[];

  constructor(
    readonly deck: DeckSession,
    readonly center: BroadcastCenter,
    timerOptions: PauseableTimerOptions = {},
  ) {
    this.timer = new PauseableTimer(
      (text, state) => this.center.broadcast({ type: ServerEventType.TIMER, text, running: state === 'running' }),
      timerOptions,
    );
    this.detachViews = (['presenter', 'projector', 'organizer'] as const).map((role) =>
      deck.sync.addView(new RoleView(role, center)),
    );
  }

  addConnection(connectionId: ConnectionId, ws: EventSocket): void {
    this.center.subscribe(connectionId, ws);
    this.center.publishToConnection({ type: ServerEventType.CONNECTION_STATUS, status: 'connected', connectionId }, connectionId);
  }

  removeConnection(connectionId: ConnectionId): void {
    this.center.unsubscribe(connectionId);
  }

  /**
   * Apply one client event. Failures are reported to the sender as ERROR
   * events and never rejected.
   */
  async handle(event: ClientEvent, connectionId: ConnectionId): Promise<void> {
    try {
      await this.dispatch(event, connectionId);
    } catch (err) {
      if (!(err instanceof DeckError)) {
        console.error(`[LiveDeck] ${event.type} failed:`, err);
      } else {
        console.error(`[LiveDeck] ${err.message}`);
      }
      this.reply(connectionId, { type: ServerEventType.ERROR, title: event.type, error: errorMessage(err) });
    }
  }

  stop(): void {
    this.timer.stop();
    for (const detach of this.detachViews) detach();
    this.detachViews = [];
    this.center.clear();
  }

  private async dispatch(event: ClientEvent, connectionId: ConnectionId): Promise<void> {
    const { deck } = this;

    switch (event.type) {
      case 'HELLO':
        this.center.setRole(connectionId, event.role);
        if (event.role === 'projector' && event.viewport) {
          deck.sync.setViewport(event.viewport);
        }
        this.sendSnapshot(connectionId);
        return;

      case 'IMPORT_FILES': {
        const result = await this.serialise(() => deck.importFiles(event.paths));
        this.reply(connectionId, { type: ServerEventType.IMPORT_RESULT, ...result });
        this.publishDeck();
        return;
      }

      case 'REMOVE_SLIDE':
        if (deck.removeSlide(event.position)) this.publishDeck();
        return;

      case 'MOVE_SLIDE':
        if (deck.moveSlide(event.from, event.to)) this.publishDeck();
        return;

      case 'JUMP_TO':
        if (deck.jumpTo(event.position)) this.publishDeck();
        return;

      case 'NEXT':
        if (deck.sync.next() === 'slide') this.publishDeck();
        return;

      case 'PREVIOUS':
        if (deck.sync.previous() === 'slide') this.publishDeck();
        return;

      case 'SET_NOTES':
        deck.setNotes(event.text, event.slideId);
        this.publishDeck();
        return;

      case 'SAVE_NOTES': {
        const saved = await deck.saveNotes();
        this.reply(connectionId, { type: ServerEventType.NOTES_SAVED, path: deck.notes.path, saved });
        return;
      }

      case 'START_TIMER':
        this.timer.start();
        return;

      case 'STOP_TIMER':
        this.timer.stop();
        return;

      case 'RESET_TIMER':
        this.timer.reset();
        return;

      case 'EXPORT_PDF': {
        const pageCount = await this.serialise(() => deck.exportPdf(event.outputPath));
        this.reply(connectionId, { type: ServerEventType.EXPORT_RESULT, outputPath: event.outputPath, pageCount });
        return;
      }

      case 'ENTER_PRESENTATION':
        await this.serialise(() => deck.sync.enterPresentation(event.display));
        return;

      case 'EXIT_PRESENTATION':
        deck.sync.exitPresentation();
        return;

      case 'VIEWPORT':
        if (this.center.getRole(connectionId) === 'projector') {
          deck.sync.setViewport(event.viewport);
        }
        return;

      default: {
        const unhandled: never = event;
        throw new Error(`Unhandled client event: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private sendSnapshot(connectionId: ConnectionId): void {
    this.reply(connectionId, { type: ServerEventType.DECK_STATE, deck: this.deck.snapshot() });
    this.reply(connectionId, { type: ServerEventType.PRESENTATION_STATE, state: this.deck.sync.snapshot() });
    this.reply(connectionId, {
      type: ServerEventType.TIMER,
      text: this.timer.text(),
      running: this.timer.state === 'running',
    });
  }

  private publishDeck(): void {
    this.center.broadcast({ type: ServerEventType.DECK_STATE, deck: this.deck.snapshot() });
  }

  private reply(connectionId: ConnectionId, event: ServerEvent): void {
    this.center.publishToConnection(event, connectionId);
  }

  /** Run `task` after every previously queued task has settled. */
  private serialise<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The caller sees the failure through `run`; the queue only waits on it
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
