import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { outputFile } from 'fs-extra/esm';
import { PDFDocument } from 'pdf-lib';
import type { HtmlRenderer } from '../src/render/renderer.js';

export interface RenderCall {
  htmlFile: string;
  baseDir: string;
  stylesheet: string;
}

export interface FakeRendererOptions {
  /** Milliseconds each file takes to render. */
  delays?: Record<string, number>;
  /** File that fails to render. */
  failOn?: string;
  /** Message `close()` rejects with. */
  closeError?: string;
}

/**
 * Renders each chapter to one page per entry in `layout[fileName]`, using the
 * entry as the page width so tests can read back page order.
 */
export class FakeRenderer implements HtmlRenderer {
  readonly calls: RenderCall[] = [];
  closed = 0;

  constructor(
    private readonly layout: Record<string, number[]>,
    private readonly options: FakeRendererOptions = {},
  ) {}

  async render(htmlFile: string, baseDir: string, stylesheet: string): Promise<Uint8Array> {
    this.calls.push({ htmlFile, baseDir, stylesheet });
    const fileName = basename(htmlFile);

    const delay = this.options.delays?.[fileName];
    if (delay) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }

    if (fileName === this.options.failOn) {
      throw new Error(`engine exploded on ${fileName}`);
    }

    const widths = this.layout[fileName];
    if (!widths) {
      throw new Error(`no layout for ${fileName}`);
    }

    const pdf = await PDFDocument.create();
    for (const width of widths) {
      pdf.addPage([width, 800]);
    }
    return await pdf.save();
  }

  async close(): Promise<void> {
    this.closed++;
    if (this.options.closeError) {
      throw new Error(this.options.closeError);
    }
  }
}

export async function makeTempDir(): Promise<string> {
  return await mkdtemp(join(tmpdir(), 'bindery-test-'));
}

export async function writeFiles(dir: string, files: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    await outputFile(join(dir, name), content);
  }
}

export function chapterHtml(title: string): string {
  return `<!DOCTYPE html><html><head><title>${title}</title></head><body><h1>${title}</h1></body></html>`;
}

export async function readPageWidths(path: string): Promise<number[]> {
  const pdf = await PDFDocument.load(await readFile(path));
  return pdf.getPages().map((page) => page.getWidth());
}
