import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { PathLike } from 'fs';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { listPdfTree } from '../library/pdf-browser.js';

const { unreadable } = vi.hoisted(() => ({ unreadable: new Set<string>() }));

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return {
    ...actual,
    readdir: async (path: PathLike, options: { withFileTypes: true }) => {
      if (unreadable.has(String(path))) {
        throw Object.assign(new Error(`EACCES: permission denied, scandir '${String(path)}'`), { code: 'EACCES' });
      }
      return actual.readdir(path, options);
    },
  };
});

describe('listPdfTree', () => {
  let root: string;

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    root = await mkdtemp(join(tmpdir(), 'pdfdeck-library-'));
  });

  afterEach(async () => {
    unreadable.clear();
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it('lists folders first, then PDFs sorted without regard to case', async () => {
    await mkdir(join(root, 'zeta'));
    await mkdir(join(root, 'archive'));
    await writeFile(join(root, 'archive', 'old.pdf'), '');
    await writeFile(join(root, 'archive', 'old.txt'), '');
    await writeFile(join(root, 'gamma.pdf'), '');
    await writeFile(join(root, 'Alpha.PDF'), '');
    await writeFile(join(root, 'beta.pdf'), '');
    await writeFile(join(root, 'readme.md'), '');

    expect(await listPdfTree(root)).toEqual([
      {
        name: 'archive',
        path: join(root, 'archive'),
        kind: 'folder',
        children: [{ name: 'old.pdf', path: join(root, 'archive', 'old.pdf'), kind: 'file' }],
      },
      { name: 'zeta', path: join(root, 'zeta'), kind: 'folder', children: [] },
      { name: 'Alpha.PDF', path: join(root, 'Alpha.PDF'), kind: 'file' },
      { name: 'beta.pdf', path: join(root, 'beta.pdf'), kind: 'file' },
      { name: 'gamma.pdf', path: join(root, 'gamma.pdf'), kind: 'file' },
    ]);
  });

  it('returns an empty listing for a folder that does not exist', async () => {
    expect(await listPdfTree(join(root, 'nowhere'))).toEqual([]);
    expect(console.warn).toHaveBeenCalledWith(`[PdfBrowser] Folder does not exist: ${join(root, 'nowhere')}`);
  });

  it('lists an unreadable subfolder without children and keeps its siblings', async () => {
    await mkdir(join(root, 'locked'));
    await writeFile(join(root, 'locked', 'secret.pdf'), '');
    await writeFile(join(root, 'talk.pdf'), '');
    unreadable.add(join(root, 'locked'));

    expect(await listPdfTree(root)).toEqual([
      { name: 'locked', path: join(root, 'locked'), kind: 'folder', children: [] },
      { name: 'talk.pdf', path: join(root, 'talk.pdf'), kind: 'file' },
    ]);
    expect(console.warn).toHaveBeenCalledWith(`[PdfBrowser] Failed to list ${join(root, 'locked')}:`, expect.any(Error));
  });

  it('fails when the top folder itself cannot be read', async () => {
    unreadable.add(root);
    await expect(listPdfTree(root)).rejects.toThrow('EACCES');
  });

  it('returns an empty listing for a file path', async () => {
    await writeFile(join(root, 'talk.pdf'), '');
    expect(await listPdfTree(join(root, 'talk.pdf'))).toEqual([]);
  });
});
