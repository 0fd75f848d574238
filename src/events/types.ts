import { Book, Chapter } from '../book/types.js';

export interface BookResolveEvent {
  type: 'book:resolve';
  book: Book;
}

export interface ChaptersFoundEvent {
  type: 'chapters:found';
  book: Book;
  chapters: Chapter[];
}

export interface PageLayoutEvent {
  type: 'page:layout';
  size: string;
  margin: string;
}

export interface ChapterRenderStartEvent {
  type: 'chapter:render:start';
  chapter: Chapter;
}

export interface ChapterRenderCompleteEvent {
  type: 'chapter:render:complete';
  chapter: Chapter;
  pageCount: number;
}

export interface PdfMergeStartEvent {
  type: 'pdf:merge:start';
  totalChapters: number;
}

export interface PdfWriteCompleteEvent {
  type: 'pdf:write:complete';
  outputPath: string;
  totalPages: number;
}

export interface ProcessingCompleteEvent {
  type: 'processing:complete';
  outputPath: string;
  stats: {
    totalChapters: number;
    totalPages: number;
    elapsed: number;
  };
}

export type ProgressEvent =
  | BookResolveEvent
  | ChaptersFoundEvent
  | PageLayoutEvent
  | ChapterRenderStartEvent
  | ChapterRenderCompleteEvent
  | PdfMergeStartEvent
  | PdfWriteCompleteEvent
  | ProcessingCompleteEvent;

export type EventListener = (event: ProgressEvent) => void;
