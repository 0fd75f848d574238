import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { outputFile, remove } from 'fs-extra/esm';
import { executeCommand } from '../utils/command.js';
import type { Logger } from '../logger/mod.js';
import { RenderFailedError } from '../errors.js';
import { HtmlRenderer } from './renderer.js';

export interface WeasyPrintOptions {
  /** Program to run. */
  command?: string | undefined;
  /** Milliseconds before a single render is killed. */
  timeout?: number | undefined;
  /** Where engine runs are logged. Without one, runs go to the shared logger if it is open. */
  logger?: Logger | undefined;
}

export class WeasyPrintRenderer implements HtmlRenderer {
  private readonly command: string;
  private readonly timeout: number | undefined;
  private readonly logger: Logger | undefined;
  private workDir?: Promise<string>;
  private readonly stylesheets = new Map<string, Promise<string>>();
  private renderCount = 0;

  constructor(options: WeasyPrintOptions = {}) {
    this.command = options.command ?? 'weasyprint';
    this.timeout = options.timeout;
    this.logger = options.logger;
  }

  async render(htmlFile: string, baseDir: string, stylesheet: string): Promise<Uint8Array> {
    const workDir = await this.getWorkDir();
    const stylesheetFile = await this.writeStylesheet(workDir, stylesheet);
    const pdfFile = join(workDir, `render_${++this.renderCount}.pdf`);

    const args = [
      '--stylesheet',
      stylesheetFile,
      '--base-url',
      baseDir,
      htmlFile,
      pdfFile,
    ];

    const result = await executeCommand(this.command, args, { timeout: this.timeout, logger: this.logger });
    if (!result.success) {
      throw new RenderFailedError(htmlFile, result.stderr || `${this.command} exited with code ${result.exitCode}`);
    }

    return await readFile(pdfFile);
  }

  async close(): Promise<void> {
    if (!this.workDir) {
      return;
    }
    const workDir = await this.workDir;
    this.workDir = undefined;
    this.stylesheets.clear();
    await remove(workDir);
  }

  private getWorkDir(): Promise<string> {
    if (!this.workDir) {
      this.workDir = mkdtemp(join(tmpdir(), 'bindery-'));
    }
    return this.workDir;
  }

  private writeStylesheet(workDir: string, stylesheet: string): Promise<string> {
    const existing = this.stylesheets.get(stylesheet);
    if (existing) {
      return existing;
    }

    const stylesheetFile = join(workDir, `page_${this.stylesheets.size + 1}.css`);
    const written = outputFile(stylesheetFile, stylesheet).then(() => stylesheetFile);
    this.stylesheets.set(stylesheet, written);
    return written;
  }
}
