import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MatrixProgressListener } from '../src/events/mod.js';

const book = { id: 'b1', dir: 'output/b1' };
const chapters = [1, 2, 3, 4].map((number) => ({
  number,
  fileName: `00${number}.html`,
  path: `output/b1/00${number}.html`,
}));

function chapter(number: number) {
  const found = chapters.find((candidate) => candidate.number === number);
  if (!found) {
    throw new Error(`no chapter ${number}`);
  }
  return found;
}

let frames: string[][];
let printed: string[];

beforeEach(() => {
  vi.useFakeTimers();
  frames = [];
  printed = [];
  vi.spyOn(console, 'clear').mockImplementation(() => {
    frames.push([]);
  });
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    const line = args.map(String).join(' ');
    printed.push(line);
    frames[frames.length - 1]?.push(line);
  });
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

function lastFrame(): string[] {
  return frames[frames.length - 1] ?? [];
}

function frame(row: string, stats: string, pages: number, time: string): string[] {
  const divider = '─'.repeat(process.stdout.columns || 80);
  return [
    '📊 Rendering Progress Matrix',
    '⬜ Pending  🟦 Rendering  🟨 Rendered  🟪 Merged',
    divider,
    row,
    divider,
    stats,
    `📄 Pages: ${pages}`,
    `⏱️  ${time}`,
    '',
  ];
}

describe('MatrixProgressListener', () => {
  it('ignores events until the chapters are known', () => {
    const listener = new MatrixProgressListener();

    listener.listen({ type: 'chapter:render:start', chapter: chapter(1) });
    listener.listen({ type: 'pdf:write:complete', outputPath: 'output/b1.pdf', totalPages: 1 });

    expect(printed).toEqual([]);
  });

  it('tracks every chapter from pending to merged', () => {
    const listener = new MatrixProgressListener();

    listener.listen({ type: 'chapters:found', book, chapters });
    expect(lastFrame()).toEqual(
      frame('⬜⬜⬜⬜', 'Chapters: 4 | Rendering: 0 | Rendered: 0 | Merged: 0', 0, '0s elapsed'),
    );

    vi.advanceTimersByTime(1000);
    listener.listen({ type: 'chapter:render:start', chapter: chapter(1) });
    expect(lastFrame()).toEqual(
      frame('🟦⬜⬜⬜', 'Chapters: 4 | Rendering: 1 | Rendered: 0 | Merged: 0', 0, '1s elapsed'),
    );

    // Updates closer together than the redraw interval are folded into the next frame
    const framesBefore = frames.length;
    listener.listen({ type: 'chapter:render:start', chapter: chapter(2) });
    expect(frames).toHaveLength(framesBefore);

    vi.advanceTimersByTime(1000);
    listener.listen({ type: 'chapter:render:complete', chapter: chapter(1), pageCount: 5 });
    expect(lastFrame()).toEqual(
      frame('🟨🟦⬜⬜', 'Chapters: 4 | Rendering: 1 | Rendered: 1 | Merged: 0', 5, '2s elapsed'),
    );

    vi.advanceTimersByTime(1000);
    listener.listen({ type: 'chapter:render:complete', chapter: chapter(2), pageCount: 3 });
    expect(lastFrame()).toEqual(
      frame('🟨🟨⬜⬜', 'Chapters: 4 | Rendering: 0 | Rendered: 2 | Merged: 0', 8, '3s elapsed'),
    );

    vi.advanceTimersByTime(1000);
    listener.listen({ type: 'chapter:render:complete', chapter: chapter(3), pageCount: 2 });
    expect(lastFrame()).toEqual(
      frame('🟨🟨🟨⬜', 'Chapters: 4 | Rendering: 0 | Rendered: 3 | Merged: 0', 10, '4s elapsed | 1s remaining'),
    );

    vi.advanceTimersByTime(1000);
    listener.listen({ type: 'chapter:render:complete', chapter: chapter(4), pageCount: 1 });
    expect(lastFrame()).toEqual(
      frame('🟨🟨🟨🟨', 'Chapters: 4 | Rendering: 0 | Rendered: 4 | Merged: 0', 11, '5s elapsed'),
    );

    listener.listen({ type: 'pdf:write:complete', outputPath: 'output/b1.pdf', totalPages: 11 });
    expect(lastFrame()).toEqual(
      frame('🟪🟪🟪🟪', 'Chapters: 4 | Rendering: 0 | Rendered: 4 | Merged: 4', 11, '5s elapsed'),
    );
  });

  it('prints a summary when processing completes', () => {
    const listener = new MatrixProgressListener();

    listener.listen({ type: 'chapters:found', book, chapters: [chapter(1), chapter(2)] });
    vi.advanceTimersByTime(1000);
    listener.listen({ type: 'chapter:render:complete', chapter: chapter(1), pageCount: 4 });
    vi.advanceTimersByTime(1000);
    listener.listen({ type: 'chapter:render:complete', chapter: chapter(2), pageCount: 6 });
    listener.listen({ type: 'pdf:write:complete', outputPath: 'output/b1.pdf', totalPages: 10 });
    vi.advanceTimersByTime(63_000);
    listener.listen({
      type: 'processing:complete',
      outputPath: 'output/b1.pdf',
      stats: { totalChapters: 2, totalPages: 10, elapsed: 65 },
    });

    expect(printed.slice(-3)).toEqual([
      '\n✨ Rendering Complete!',
      '📚 Merged 2 chapters into 10 pages',
      '⏱️  Total time: 1m 5s',
    ]);
  });
});
