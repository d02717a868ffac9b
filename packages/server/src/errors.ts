/**
 * Error taxonomy for deck operations.
 */

import type { SlideId } from '@pdfdeck/shared';

export class DeckError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A source document could not be opened. Recoverable per file. */
export class LoadError extends DeckError {
  constructor(readonly path: string, cause?: unknown) {
    super(`Failed to load: ${path}${describeCause(cause)}`, { cause });
  }
}

/** A slide id that was never registered. Indicates a sequencing bug. */
export class UnknownSlideError extends DeckError {
  constructor(readonly slideId: SlideId) {
    super(`Unknown slide id: ${slideId}`);
  }
}

export class ExportError extends DeckError {
  constructor(readonly outputPath: string, cause?: unknown) {
    super(`Failed to export PDF to ${outputPath}${describeCause(cause)}`, { cause });
  }
}

export class NotesError extends DeckError {
  constructor(readonly path: string, cause?: unknown) {
    super(`Failed to access notes file ${path}${describeCause(cause)}`, { cause });
  }
}

function describeCause(cause: unknown): string {
  if (cause === undefined) return '';
  const message = cause instanceof Error ? cause.message : String(cause);
  return message ? `: ${message}` : '';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
