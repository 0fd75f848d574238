import type { ProgressEvent } from '../types.js';
import { formatDuration } from '../../utils/time.js';

export class ConsoleProgressListener {
  private chaptersRendered = 0;
  private totalChapters = 0;
  private matrixMode = false;

  constructor(matrixMode = false) {
    this.matrixMode = matrixMode;
  }

  listen(event: ProgressEvent): void {
    switch (event.type) {
      case 'book:resolve':
        if (!this.matrixMode) {
          console.log(`📚 Processing book: ${event.book.id}`);
          console.log(`Book directory: ${event.book.dir}`);
        }
        break;

      case 'chapters:found':
        this.totalChapters = event.chapters.length;
        if (!this.matrixMode) {
          console.log(`Found ${event.chapters.length} HTML files`);
        }
        break;

      case 'page:layout':
        if (!this.matrixMode) {
          console.log(`Page size: ${event.size}`);
          console.log(`Margins: ${event.margin}`);
          console.log();
        }
        break;

      case 'chapter:render:start':
        if (!this.matrixMode) {
          console.log(`  📝 Processing: ${event.chapter.fileName}`);
        }
        break;

      case 'chapter:render:complete':
        this.chaptersRendered++;
        if (!this.matrixMode) {
          console.log(
            `  ✓ ${event.chapter.fileName}: ${event.pageCount} pages (${this.chaptersRendered}/${this.totalChapters})`,
          );
        }
        break;

      case 'pdf:merge:start':
        if (!this.matrixMode) {
          console.log(`\n📄 Merging ${event.totalChapters} chapters...`);
        }
        break;

      case 'pdf:write:complete':
        if (!this.matrixMode) {
          console.log(`  ✓ PDF written`);
        }
        break;

      case 'processing:complete':
        console.log(`\n✨ PDF created successfully: ${event.outputPath}`);
        console.log(`📊 Final stats:`);
        console.log(`  📚 ${event.stats.totalChapters} chapters merged`);
        console.log(`  📄 Total pages: ${event.stats.totalPages}`);
        console.log(`  ⏱️  ${formatDuration(event.stats.elapsed)} elapsed`);
        break;
    }
  }
}
