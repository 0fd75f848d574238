import { formatDuration } from './time.js';

export enum ChapterState {
  PENDING = '⬜', // Not rendered yet
  RENDERING = '🟦', // Handed to the engine
  RENDERED = '🟨', // Pages available
  MERGED = '🟪', // Written to the final PDF
}

export interface ChapterProgress {
  chapterNumber: number;
  fileName: string;
  state: ChapterState;
  pageCount: number;
}

export class ProgressMatrix {
  private chapters: ChapterProgress[] = [];
  private display: string[][] = [];
  private maxWidth: number;
  private lastUpdate = 0;
  private updateThrottle = 200; // milliseconds
  private startTime: number;

  constructor(chapters: Array<{ number: number; fileName: string }>) {
    this.maxWidth = this.getTerminalWidth();
    this.startTime = Date.now();

    for (const chapter of chapters) {
      this.chapters.push({
        chapterNumber: chapter.number,
        fileName: chapter.fileName,
        state: ChapterState.PENDING,
        pageCount: 0,
      });
    }

    this.updateDisplay();
    this.render();
  }

  private getTerminalWidth(): number {
    return process.stdout.columns || 80;
  }

  updateChapterState(chapterNumber: number, state: ChapterState, pageCount?: number): void {
    const chapter = this.chapters.find((c) => c.chapterNumber === chapterNumber);
    if (chapter) {
      chapter.state = state;
      if (pageCount !== undefined) {
        chapter.pageCount = pageCount;
      }
      this.throttledUpdate();
    }
  }

  updateAllState(state: ChapterState): void {
    for (const chapter of this.chapters) {
      chapter.state = state;
    }
    this.updateDisplay();
    this.render();
  }

  private throttledUpdate(): void {
    const now = Date.now();
    if (now - this.lastUpdate > this.updateThrottle) {
      this.updateDisplay();
      this.render();
      this.lastUpdate = now;
    }
  }

  private updateDisplay(): void {
    this.display = [];
    let currentRow: string[] = [];

    // Each emoji is roughly 2 characters wide
    const nodesPerRow = Math.max(1, Math.floor(this.maxWidth / 2));

    for (const chapter of this.chapters) {
      if (currentRow.length >= nodesPerRow) {
        this.display.push(currentRow);
        currentRow = [];
      }
      currentRow.push(chapter.state);
    }

    if (currentRow.length > 0) {
      this.display.push(currentRow);
    }
  }

  private render(): void {
    console.clear();

    console.log('📊 Rendering Progress Matrix');
    console.log('⬜ Pending  🟦 Rendering  🟨 Rendered  🟪 Merged');
    console.log('─'.repeat(this.maxWidth));

    for (const row of this.display) {
      console.log(row.join(''));
    }

    console.log('─'.repeat(this.maxWidth));

    const stats = this.getStats();
    const timeInfo = this.getTimeEstimation();
    console.log(`Chapters: ${stats.total} | Rendering: ${stats.rendering} | Rendered: ${stats.rendered} | Merged: ${stats.merged}`);
    console.log(`📄 Pages: ${stats.pages.toLocaleString()}`);
    console.log(`⏱️  ${timeInfo.elapsed} elapsed${timeInfo.estimate ? ` | ${timeInfo.estimate} remaining` : ''}`);
    console.log();
  }

  private getStats() {
    const total = this.chapters.length;
    const rendering = this.chapters.filter((c) => c.state === ChapterState.RENDERING).length;
    const rendered = this.chapters.filter((c) => c.state === ChapterState.RENDERED || c.state === ChapterState.MERGED).length;
    const merged = this.chapters.filter((c) => c.state === ChapterState.MERGED).length;
    const pages = this.chapters.reduce((sum, c) => sum + c.pageCount, 0);

    return { total, rendering, rendered, merged, pages };
  }

  private getTimeEstimation(): { elapsed: string; estimate?: string } {
    const elapsedSeconds = (Date.now() - this.startTime) / 1000;
    const elapsed = formatDuration(elapsedSeconds);

    // Only estimate once a few chapters give a usable rate
    const stats = this.getStats();
    if (stats.rendered < 3 || elapsedSeconds === 0) {
      return { elapsed };
    }

    const rate = stats.rendered / elapsedSeconds; // chapters per second
    const remaining = stats.total - stats.rendered;
    if (rate > 0 && remaining > 0) {
      return { elapsed, estimate: formatDuration(remaining / rate) };
    }

    return { elapsed };
  }

  showSummary(): void {
    const stats = this.getStats();
    const timeInfo = this.getTimeEstimation();
    console.log(`\n✨ Rendering Complete!`);
    console.log(`📚 Merged ${stats.merged} chapters into ${stats.pages} pages`);
    console.log(`⏱️  Total time: ${timeInfo.elapsed}`);
  }
}
