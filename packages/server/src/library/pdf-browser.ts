/**
 * Folder tree of PDF files for the organizer's file panel.
 */

import type { Dirent } from 'fs';
import { readdir } from 'fs/promises';
import { extname, join } from 'path';
import type { LibraryEntry } from '@pdfdeck/shared';

const byName = (a: string, b: string) => a.localeCompare(b);
const byNameIgnoringCase = (a: string, b: string) => a.toLowerCase().localeCompare(b.toLowerCase());

function isPdf(name: string): boolean {
  return extname(name).toLowerCase() === '.pdf';
}

/**
 * List subfolders (recursively) and PDF files of `folder`, folders first.
 * A folder that does not exist yields an empty listing. A subfolder that
 * cannot be read is listed without children.
 */
export async function listPdfTree(folder: string): Promise<LibraryEntry[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(folder, { withFileTypes: true });
  } catch (err) {
    if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      console.warn(`[PdfBrowser] Folder does not exist: ${folder}`);
      return [];
    }
    throw err;
  }

  const folders = entries.filter((e) => e.isDirectory()).map((e) => e.name).sort(byName);
  const files = entries.filter((e) => e.isFile() && isPdf(e.name)).map((e) => e.name).sort(byNameIgnoringCase);

  const result: LibraryEntry[] = [];
  for (const name of folders) {
    const path = join(folder, name);
    result.push({ name, path, kind: 'folder', children: await listSubfolder(path) });
  }
  for (const name of files) {
    result.push({ name, path: join(folder, name), kind: 'file' });
  }
  return result;
}


async function listSubfolder(path: string): Promise<LibraryEntry[]> {
  try {
    return await listPdfTree(path);
  } catch (err) {
    console.warn(`[PdfBrowser] Failed to list ${path}:`, err);
    return [];
  }
}
