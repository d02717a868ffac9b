import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { NotesStore, notesPathFor, parseNotes, serializeNotes } from '../deck/notes-store.js';
import { NotesError } from '../errors.js';

describe('notes format', () => {
  it('serializes each entry as a marker line followed by its text', () => {
    const text = serializeNotes([
      [3, 'first\nsecond'],
      [1, ''],
    ]);
    expect(text).toBe('==XXslide3\nfirst\nsecond\n==XXslide1\n\n');
  });

  it('parses text up to the next marker, ignoring a preamble', () => {
    const notes = parseNotes('preamble\n==XXslide2\nHello\nWorld\n==XXslide0\nSingle\n');
    expect([...notes.entries()]).toEqual([
      [2, 'Hello\nWorld'],
      [0, 'Single'],
    ]);
  });

  it('accepts a marker with surrounding whitespace and a final line without newline', () => {
    const notes = parseNotes('  ==XXslide5  \r\nlast line');
    expect(notes.get(5)).toBe('last line');
  });

  it('treats a line that only mentions the marker as note text', () => {
    const notes = parseNotes('==XXslide1\nsee ==XXslide2 later\n==XXslide3x\n');
    expect([...notes.entries()]).toEqual([[1, 'see ==XXslide2 later\n==XXslide3x']]);
  });

  it('keeps blank lines inside a note', () => {
    expect(parseNotes('==XXslide0\na\n\nb\n').get(0)).toBe('a\n\nb');
  });

  it('puts the sidecar next to the PDF', () => {
    expect(notesPathFor('/decks/talk.pdf')).toBe('/decks/talk.pdf.notes');
  });
});

describe('NotesStore', () => {
  let dir: string;
  let pdfPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pdfdeck-notes-'));
    pdfPath = join(dir, 'talk.pdf');
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('returns an empty string for slides without notes', () => {
    const store = new NotesStore();
    expect(store.get(4)).toBe('');
    expect(store.size).toBe(0);
  });

  it('yields an empty store when the sidecar does not exist', async () => {
    const store = new NotesStore();
    expect(await store.load(pdfPath)).toBe(0);
    expect(store.size).toBe(0);
    expect(store.path).toBe(`${pdfPath}.notes`);
  });

  it('round-trips a mapping with multi-line entries', async () => {
    const store = new NotesStore();
    store.set(0, 'Welcome everyone');
    store.set(3, 'Point one\nPoint two\n\nClosing remark');
    store.set(1, '');
    store.set(2, 'ends with newline\n');
    expect(await store.save(pdfPath)).toBe(true);

    const reloaded = new NotesStore();
    expect(await reloaded.load(pdfPath)).toBe(4);
    expect(reloaded.entries()).toEqual(store.entries());

    // A second round trip does not grow the notes
    await reloaded.save();
    const again = new NotesStore();
    await again.load(pdfPath);
    expect(again.entries()).toEqual(store.entries());
  });

  it('writes the documented file layout', async () => {
    const store = new NotesStore();
    store.set(7, 'line a\nline b');
    await store.save(pdfPath);
    expect(await readFile(`${pdfPath}.notes`, 'utf-8')).toBe('==XXslide7\nline a\nline b\n');
  });

  it('merges loaded notes over existing ones', async () => {
    await writeFile(`${pdfPath}.notes`, '==XXslide1\nfrom file\n', 'utf-8');
    const store = new NotesStore();
    store.set(0, 'typed before load');
    store.set(1, 'replaced');
    await store.load(pdfPath);
    expect(store.get(0)).toBe('typed before load');
    expect(store.get(1)).toBe('from file');
  });

  it('does not write a file when there is nothing to save', async () => {
    const store = new NotesStore();
    await store.load(pdfPath);
    expect(await store.save()).toBe(false);
    expect(existsSync(`${pdfPath}.notes`)).toBe(false);
  });

  it('does not save without a path', async () => {
    const store = new NotesStore();
    store.set(0, 'orphan');
    expect(await store.save()).toBe(false);
  });

  it('raises NotesError and keeps its entries when the write fails', async () => {
    const store = new NotesStore();
    store.set(0, 'keep me');
    const target = join(dir, 'missing-folder', 'talk.pdf');

    await expect(store.save(target)).rejects.toBeInstanceOf(NotesError);
    expect(store.get(0)).toBe('keep me');
  });
});
