import { join } from 'node:path';
import { outputFile } from 'fs-extra/esm';
import PQueue from 'p-queue';
import { PDFDocument } from 'pdf-lib';
import { Book, Chapter } from '../book/types.js';
import { HtmlRenderer } from '../render/renderer.js';
import { events } from '../events/mod.js';
import { BindResult, ChapterSummary, RenderedDocument } from './types.js';
import { OutlineCollector, PageRefMap } from './outline.js';

export { buildStyleDirective, INTRINSIC_PAGE_SIZE, PAGE_SIZES, parsePageSize, resolvePageSize } from './page-size.js';
export * from './types.js';

const PRODUCER = 'bindery';

export async function renderChapter(
  chapter: Chapter,
  book: Book,
  stylesheet: string,
  renderer: HtmlRenderer,
): Promise<RenderedDocument> {
  events.emit({ type: 'chapter:render:start', chapter });

  const bytes = await renderer.render(chapter.path, book.dir, stylesheet);
  const pdf = await PDFDocument.load(bytes);
  const pageCount = pdf.getPageCount();

  events.emit({ type: 'chapter:render:complete', chapter, pageCount });

  return { chapter, pdf, pageCount };
}

/**
 * Renders every chapter against the same style sheet. The result is in
 * chapter order whatever order the renders finish in.
 */
export async function renderChapters(
  chapters: Chapter[],
  book: Book,
  stylesheet: string,
  renderer: HtmlRenderer,
  concurrency = 1,
): Promise<RenderedDocument[]> {
  const queue = new PQueue({ concurrency });

  try {
    return await Promise.all(chapters.map((chapter) => {
      return queue.add(() => renderChapter(chapter, book, stylesheet, renderer), { throwOnTimeout: true });
    }));
  } catch (error) {
    // Let renders already handed to the engine finish before the caller releases it
    queue.clear();
    await queue.onIdle();
    throw error;
  }
}

/**
 * Copies the pages of every document, in order, into a new PDF, along with
 * each document's bookmarks and named destinations. Returns undefined when
 * there is nothing to merge.
 */
export async function mergeDocuments(documents: RenderedDocument[], title?: string): Promise<PDFDocument | undefined> {
  if (documents.length === 0) {
    return undefined;
  }

  const output = await PDFDocument.create();
  if (title) {
    output.setTitle(title);
  }
  output.setCreator(PRODUCER);
  output.setProducer(PRODUCER);

  const navigation = new OutlineCollector(output);

  for (const document of documents) {
    const sourcePages = document.pdf.getPages();
    const pages = await output.copyPages(document.pdf, document.pdf.getPageIndices());
    const pageRefs: PageRefMap = new Map();

    pages.forEach((page, index) => {
      output.addPage(page);
      const source = sourcePages[index];
      if (source) {
        pageRefs.set(source.ref, page.ref);
      }
    });

    navigation.add(document.pdf, pageRefs);
  }

  navigation.write();

  return output;
}

export async function writeBook(
  book: Book,
  documents: RenderedDocument[],
  outputDir: string,
  title: string = book.id,
): Promise<BindResult | undefined> {
  events.emit({ type: 'pdf:merge:start', totalChapters: documents.length });

  const merged = await mergeDocuments(documents, title);
  if (!merged) {
    return undefined;
  }

  const outputPath = join(outputDir, `${book.id}.pdf`);
  await outputFile(outputPath, await merged.save());

  const totalPages = merged.getPageCount();

  events.emit({ type: 'pdf:write:complete', outputPath, totalPages });

  return { book, outputPath, totalPages, chapters: summarize(documents) };
}

function summarize(documents: RenderedDocument[]): ChapterSummary[] {
  let nextPage = 1;

  return documents.map((document) => {
    const summary = {
      fileName: document.chapter.fileName,
      pageCount: document.pageCount,
      firstPage: nextPage,
    };

    nextPage += document.pageCount;

    return summary;
  });
}
