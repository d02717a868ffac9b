/**
 * WebSocket event types for view-server communication.
 */

import type {
  DeckSnapshot,
  ImportFailure,
  PresentationSnapshot,
  Size,
  SlideId,
  ViewRole,
} from './deck.js';

// ============ Event Type Constants ============

/** Server → Client event type discriminants. */
export const ServerEventType = {
  CONNECTION_STATUS: 'CONNECTION_STATUS',
  DECK_STATE: 'DECK_STATE',
  PRESENTATION_STATE: 'PRESENTATION_STATE',
  TIMER: 'TIMER',
  IMPORT_RESULT: 'IMPORT_RESULT',
  EXPORT_RESULT: 'EXPORT_RESULT',
  NOTES_SAVED: 'NOTES_SAVED',
  ERROR: 'ERROR',
} as const;

/** Client → Server event type discriminants. */
export const ClientEventType = {
  HELLO: 'HELLO',
  IMPORT_FILES: 'IMPORT_FILES',
  REMOVE_SLIDE: 'REMOVE_SLIDE',
  MOVE_SLIDE: 'MOVE_SLIDE',
  JUMP_TO: 'JUMP_TO',
  NEXT: 'NEXT',
  PREVIOUS: 'PREVIOUS',
  SET_NOTES: 'SET_NOTES',
  SAVE_NOTES: 'SAVE_NOTES',
  START_TIMER: 'START_TIMER',
  STOP_TIMER: 'STOP_TIMER',
  RESET_TIMER: 'RESET_TIMER',
  EXPORT_PDF: 'EXPORT_PDF',
  ENTER_PRESENTATION: 'ENTER_PRESENTATION',
  EXIT_PRESENTATION: 'EXIT_PRESENTATION',
  VIEWPORT: 'VIEWPORT',
} as const;

// ============ Client → Server Events ============

export interface HelloEvent {
  type: typeof ClientEventType.HELLO;
  role: ViewRole;
  viewport?: Size;
}

export interface ImportFilesEvent {
  type: typeof ClientEventType.IMPORT_FILES;
  paths: string[];
}

export interface RemoveSlideEvent {
  type: typeof ClientEventType.REMOVE_SLIDE;
  position: number;
}

export interface MoveSlideEvent {
  type: typeof ClientEventType.MOVE_SLIDE;
  from: number;
  to: number;
}

export interface JumpToEvent {
  type: typeof ClientEventType.JUMP_TO;
  position: number;
}

export interface NextEvent {
  type: typeof ClientEventType.NEXT;
}

export interface PreviousEvent {
  type: typeof ClientEventType.PREVIOUS;
}

export interface SetNotesEvent {
  type: typeof ClientEventType.SET_NOTES;
  /** Defaults to the current slide. */
  slideId?: SlideId;
  text: string;
}

export interface SaveNotesEvent {
  type: typeof ClientEventType.SAVE_NOTES;
}

export interface StartTimerEvent {
  type: typeof ClientEventType.START_TIMER;
}

export interface StopTimerEvent {
  type: typeof ClientEventType.STOP_TIMER;
}

export interface ResetTimerEvent {
  type: typeof ClientEventType.RESET_TIMER;
}

export interface ExportPdfEvent {
  type: typeof ClientEventType.EXPORT_PDF;
  outputPath: string;
}

export interface EnterPresentationEvent {
  type: typeof ClientEventType.ENTER_PRESENTATION;
  /** Size of the display the projector window is on. */
  display?: Size;
}

export interface ExitPresentationEvent {
  type: typeof ClientEventType.EXIT_PRESENTATION;
}

export interface ViewportEvent {
  type: typeof ClientEventType.VIEWPORT;
  viewport: Size;
}

export type ClientEvent =
  | HelloEvent
  | ImportFilesEvent
  | RemoveSlideEvent
  | MoveSlideEvent
  | JumpToEvent
  | NextEvent
  | PreviousEvent
  | SetNotesEvent
  | SaveNotesEvent
  | StartTimerEvent
  | StopTimerEvent
  | ResetTimerEvent
  | ExportPdfEvent
  | EnterPresentationEvent
  | ExitPresentationEvent
  | ViewportEvent;

// ============ Server → Client Events ============

export interface ConnectionStatusEvent {
  type: typeof ServerEventType.CONNECTION_STATUS;
  status: 'connected' | 'disconnected' | 'error';
  connectionId?: string;
  error?: string;
}

export interface DeckStateEvent {
  type: typeof ServerEventType.DECK_STATE;
  deck: DeckSnapshot;
}

export interface PresentationStateEvent {
  type: typeof ServerEventType.PRESENTATION_STATE;
  state: PresentationSnapshot;
}

export interface TimerEvent {
  type: typeof ServerEventType.TIMER;
  text: string;
  running: boolean;
}

export interface ImportResultEvent {
  type: typeof ServerEventType.IMPORT_RESULT;
  added: SlideId[];
  failures: ImportFailure[];
}

export interface ExportResultEvent {
  type: typeof ServerEventType.EXPORT_RESULT;
  outputPath: string;
  pageCount: number;
}

export interface NotesSavedEvent {
  type: typeof ServerEventType.NOTES_SAVED;
  path: string | null;
  saved: boolean;
}

export interface ErrorEvent {
  type: typeof ServerEventType.ERROR;
  error: string;
  title?: string;
}

export type ServerEvent =
  | ConnectionStatusEvent
  | DeckStateEvent
  | PresentationStateEvent
  | TimerEvent
  | ImportResultEvent
  | ExportResultEvent
  | NotesSavedEvent
  | ErrorEvent;
