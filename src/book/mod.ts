import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { pathExists } from 'fs-extra/esm';
import { Book, Chapter } from './types.js';
import { loadManifest } from './manifest.js';
import { events } from '../events/mod.js';
import {
  DirectoryNotFoundError,
  InvalidManifestError,
  MissingOutputRootError,
  NoBooksFoundError,
  NoHtmlFilesError,
} from '../errors.js';

const HTML_EXTENSION = '.html';

export { loadManifest };

export async function assertOutputRoot(outputDir: string): Promise<void> {
  if (!(await isDirectory(outputDir))) {
    throw new MissingOutputRootError(outputDir);
  }
}

export async function resolveBook(outputDir: string, bookId?: string): Promise<Book> {
  let book: Book;

  if (bookId) {
    const dir = join(outputDir, bookId);
    if (!(await isDirectory(dir))) {
      throw new DirectoryNotFoundError(dir);
    }
    book = { id: bookId, dir };
  } else {
    const first = (await visibleEntries(outputDir, 'directory')).sort()[0];

    if (first === undefined) {
      throw new NoBooksFoundError(outputDir);
    }
    book = { id: first, dir: join(outputDir, first) };
  }

  events.emit({ type: 'book:resolve', book });

  return book;
}

/**
 * Lists the book's chapters in reading order.
 *
 * Without a manifest, reading order is the lexicographic order of the HTML file
 * names, so chapters must be named such that sorting them yields the intended
 * sequence (`001.html`, `002.html`, ...). A manifest overrides the sort.
 */
export async function listChapters(book: Book, manifestPath?: string): Promise<Chapter[]> {
  const fileNames = manifestPath ? await manifestFileNames(book, manifestPath) : await htmlFileNames(book.dir);

  if (fileNames.length === 0) {
    throw new NoHtmlFilesError(book.dir);
  }

  const chapters = fileNames.map((fileName, index) => ({
    number: index + 1,
    fileName,
    path: join(book.dir, fileName),
  }));

  events.emit({ type: 'chapters:found', book, chapters });

  return chapters;
}

async function htmlFileNames(dir: string): Promise<string[]> {
  const fileNames = await visibleEntries(dir, 'file');
  return fileNames.filter((fileName) => fileName.endsWith(HTML_EXTENSION)).sort();
}

/**
 * Names of the entries in `dir` of the given kind, leaving out dot files such
 * as `._01.html`. Symbolic links count as whatever they point at.
 */
async function visibleEntries(dir: string, kind: 'file' | 'directory'): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const names: string[] = [];

  for (const entry of entries) {
    if (!entry.name.startsWith('.') && (await entryKind(dir, entry)) === kind) {
      names.push(entry.name);
    }
  }

  return names;
}

async function entryKind(dir: string, entry: Dirent): Promise<'file' | 'directory' | 'other'> {
  if (entry.isSymbolicLink()) {
    const target = join(dir, entry.name);
    // Dangling links are skipped
    if (!(await pathExists(target))) {
      return 'other';
    }
    const stats = await stat(target);
    return stats.isFile() ? 'file' : stats.isDirectory() ? 'directory' : 'other';
  }
  return entry.isFile() ? 'file' : entry.isDirectory() ? 'directory' : 'other';
}

async function manifestFileNames(book: Book, manifestPath: string): Promise<string[]> {
  const fileNames = await loadManifest(manifestPath);
  const seen = new Set<string>();

  for (const fileName of fileNames) {
    if (basename(fileName) !== fileName || fileName.includes('\\')) {
      throw new InvalidManifestError(manifestPath, `"${fileName}" must be a file name inside the book directory`);
    }
    if (!fileName.endsWith(HTML_EXTENSION)) {
      throw new InvalidManifestError(manifestPath, `"${fileName}" is not an HTML file`);
    }
    if (seen.has(fileName)) {
      throw new InvalidManifestError(manifestPath, `"${fileName}" is listed more than once`);
    }
    if (!(await pathExists(join(book.dir, fileName)))) {
      throw new InvalidManifestError(manifestPath, `"${fileName}" does not exist in ${book.dir}`);
    }
    seen.add(fileName);
  }

  return fileNames;
}

async function isDirectory(path: string): Promise<boolean> {
  if (!(await pathExists(path))) {
    return false;
  }
  return (await stat(path)).isDirectory();
}
