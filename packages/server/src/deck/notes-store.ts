/**
 * NotesStore - Speaker notes keyed by global slide id.
 *
 * Persisted next to the PDF as `<pdf>.notes`:
 *
 *   ==XXslide3
 *   first line of the note for slide 3
 *   second line
 *   ==XXslide0
 *   ...
 *
 * Notes follow the slide, not its position, so reordering never moves them.
 * Notes of deleted slides are kept.
 */

import { readFile, writeFile } from 'fs/promises';
import type { SlideId } from '@pdfdeck/shared';
import { NOTES_MARKER, NOTES_SUFFIX } from '../config.js';
import { NotesError } from '../errors.js';

const MARKER_LINE = new RegExp(`^${NOTES_MARKER}(\\d+)$`);

export function notesPathFor(pdfPath: string): string {
  return `${pdfPath}${NOTES_SUFFIX}`;
}

export function markerFor(id: SlideId): string {
  return `${NOTES_MARKER}${id}`;
}

/**
 * Parse the sidecar format. Text before the first marker is ignored.
 */
export function parseNotes(content: string): Map<SlideId, string> {
  const notes = new Map<SlideId, string>();
  let slide: SlideId | null = null;

  const lines = content.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const isLast = i === lines.length - 1;
    if (isLast && lines[i] === '') break;
    const line = isLast ? lines[i] : `${lines[i]}\n`;

    const marker = line.trim().match(MARKER_LINE);
    if (marker) {
      slide = parseInt(marker[1], 10);
      notes.set(slide, '');
    } else if (slide !== null) {
      notes.set(slide, (notes.get(slide) ?? '') + line);
    }
  }

  // serializeNotes terminates every record with a newline of its own
  for (const [id, text] of notes) {
    if (text.endsWith('\n')) {
      notes.set(id, text.slice(0, -1));
    }
  }
  return notes;
}

export function serializeNotes(notes: Iterable<[SlideId, string]>): string {
  let out = '';
  for (const [id, text] of notes) {
    out += `${markerFor(id)}\n${text}\n`;
  }
  return out;
}

export class NotesStore {
  private notes: Map<SlideId, string> = new Map();
  private notesFile: string | null = null;

  get size(): number {
    return this.notes.size;
  }

  /** Sidecar path used by save() when called without a path. */
  get path(): string | null {
    return this.notesFile;
  }

  get(id: SlideId): string {
    return this.notes.get(id) ?? '';
  }

  set(id: SlideId, text: string): void {
    this.notes.set(id, text);
  }

  entries(): [SlideId, string][] {
    return [...this.notes.entries()];
  }

  /**
   * Read `<pdfPath>.notes`, merging its entries over the current ones.
   * A missing file is not an error. Returns the number of entries read.
   */
  async load(pdfPath: string): Promise<number> {
    const file = notesPathFor(pdfPath);
    this.notesFile = file;

    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        return 0;
      }
      throw new NotesError(file, err);
    }

    console.log(`[NotesStore] Reading notes from ${file}`);
    const parsed = parseNotes(content);
    for (const [id, text] of parsed) {
      this.notes.set(id, text);
    }
    return parsed.size;
  }

  /**
   * Write every entry to `<pdfPath>.notes` (or the file last loaded).
   * Returns false when there is nothing to save or nowhere to save it.
   */
  async save(pdfPath?: string): Promise<boolean> {
    const file = pdfPath !== undefined ? notesPathFor(pdfPath) : this.notesFile;
    if (this.notes.size === 0 || !file) {
      console.log('[NotesStore] No notes to save!');
      return false;
    }

    try {
      await writeFile(file, serializeNotes(this.notes), 'utf-8');
    } catch (err) {
      throw new NotesError(file, err);
    }
    this.notesFile = file;
    console.log(`[NotesStore] Saved ${this.notes.size} note(s) to ${file}`);
    return true;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
