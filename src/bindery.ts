import * as book from './book/mod.js';
import * as pdf from './pdf/mod.js';
import { events } from './events/mod.js';
import { HtmlRenderer } from './render/renderer.js';
import { WeasyPrintRenderer } from './render/weasyprint.js';
import { BindResult, DEFAULT_MERGE_OPTIONS, MergeOptions } from './pdf/types.js';

export * from './errors.js';
export type { Book, Chapter } from './book/types.js';
export type { HtmlRenderer } from './render/renderer.js';
export { WeasyPrintRenderer, type WeasyPrintOptions } from './render/weasyprint.js';
export { events } from './events/mod.js';
export type { ProgressEvent } from './events/mod.js';
export { assertOutputRoot, listChapters, loadManifest, resolveBook } from './book/mod.js';
export {
  buildStyleDirective,
  DEFAULT_MERGE_OPTIONS,
  INTRINSIC_PAGE_SIZE,
  mergeDocuments,
  PAGE_SIZES,
  parsePageSize,
  renderChapters,
  resolvePageSize,
  writeBook,
} from './pdf/mod.js';
export type { BindResult, ChapterSummary, MergeOptions, PageSize, RenderedDocument } from './pdf/types.js';

/**
 * Merges the HTML chapters of one book into `<outputDir>/<bookId>.pdf`.
 *
 * The renderer is closed when the run ends, whether it succeeds or not.
 */
export async function bindBook(
  options: Partial<MergeOptions> = {},
  renderer: HtmlRenderer = new WeasyPrintRenderer(),
): Promise<BindResult | undefined> {
  const config: MergeOptions = {
    ...options,
    outputDir: options.outputDir ?? DEFAULT_MERGE_OPTIONS.outputDir,
    margin: options.margin ?? DEFAULT_MERGE_OPTIONS.margin,
    concurrency: options.concurrency ?? DEFAULT_MERGE_OPTIONS.concurrency,
  };

  let result: BindResult | undefined;

  try {
    await book.assertOutputRoot(config.outputDir);

    const target = await book.resolveBook(config.outputDir, config.bookId);
    const chapters = await book.listChapters(target, config.manifest);

    const size = pdf.resolvePageSize(config.pageSize);
    const stylesheet = pdf.buildStyleDirective(size, config.margin);
    events.emit({ type: 'page:layout', size, margin: config.margin });

    const documents = await pdf.renderChapters(chapters, target, stylesheet, renderer, config.concurrency);

    result = await pdf.writeBook(target, documents, config.outputDir, config.title ?? target.id);
  } catch (error) {
    // Report the pipeline failure, not a failure to clean up after it
    await renderer.close().catch((closeError: unknown) => {
      console.error('Error closing renderer:', closeError);
    });
    throw error;
  }

  await renderer.close();

  return result;
}
