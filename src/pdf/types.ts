import type { PDFDocument } from 'pdf-lib';
import { Book, Chapter } from '../book/types.js';

/**
 * A preset name (`A4`), a raw CSS page size (`8.5in 11in`), or a
 * `[width, height]` pair in millimetres. Left undefined, pages take the
 * intrinsic content size.
 */
export type PageSize = string | readonly [width: number, height: number];

export interface MergeOptions {
  /** Directory holding one subdirectory per book; the PDF is written here too. */
  outputDir: string;
  /** Book directory name under `outputDir`. The first book found is used when omitted. */
  bookId?: string | undefined;
  pageSize?: PageSize | undefined;
  /** CSS margin for every page. */
  margin: string;
  /** JSON file listing chapter file names in reading order, replacing the file name sort. */
  manifest?: string | undefined;
  /** Title stored in the PDF metadata. Defaults to the book id. */
  title?: string | undefined;
  /** Chapters rendered at once. Page order never depends on it. */
  concurrency: number;
}

export const DEFAULT_MERGE_OPTIONS = {
  outputDir: 'output',
  margin: '0',
  concurrency: 1,
} as const satisfies Partial<MergeOptions>;

export interface RenderedDocument {
  chapter: Chapter;
  pdf: PDFDocument;
  pageCount: number;
}

export interface ChapterSummary {
  fileName: string;
  pageCount: number;
  firstPage: number;
}

export interface BindResult {
  book: Book;
  outputPath: string;
  totalPages: number;
  chapters: ChapterSummary[];
}
