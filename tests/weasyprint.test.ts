import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { beforeAll, describe, expect, it } from 'vitest';
import { outputFile, pathExists } from 'fs-extra/esm';
import { PDFDocument } from 'pdf-lib';
import { Logger } from '../src/logger/mod.js';
import { WeasyPrintRenderer } from '../src/render/weasyprint.js';
import { RenderFailedError } from '../src/errors.js';
import { chapterHtml, makeTempDir, writeFiles } from './helpers.js';

let root: string;
let bookDir: string;
let htmlFile: string;
let fixture: Uint8Array;
let okEngine: string;
let badEngine: string;
let slowEngine: string;

/** Writes an executable shell script standing in for the engine. */
async function engine(name: string, body: string): Promise<string> {
  const path = join(root, 'bin', name);
  await outputFile(path, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
  return path;
}

async function readLines(path: string): Promise<string[]> {
  return (await readFile(path, 'utf8')).split('\n').filter((line) => line.length > 0);
}

beforeAll(async () => {
  root = await makeTempDir();
  bookDir = join(root, 'book');
  htmlFile = join(bookDir, '001.html');
  await writeFiles(bookDir, { '001.html': chapterHtml('One') });

  const pdf = await PDFDocument.create();
  pdf.addPage([321, 654]);
  fixture = await pdf.save();
  await outputFile(join(root, 'fixture.pdf'), fixture);

  // Arguments: --stylesheet <css> --base-url <dir> <html> <pdf>
  okEngine = await engine(
    'weasyprint-ok',
    [`echo "$2 $4 $5" >> "${join(root, 'calls.txt')}"`, `cp "${join(root, 'fixture.pdf')}" "$6"`].join('\n'),
  );
  badEngine = await engine('weasyprint-bad', 'echo "unsupported CSS at line 3" >&2\nexit 3');
  slowEngine = await engine('weasyprint-slow', 'exec sleep 5');
});

describe('WeasyPrintRenderer', () => {
  describe('with an engine that succeeds', () => {
    it('returns the PDF the engine wrote', async () => {
      const renderer = new WeasyPrintRenderer({ command: okEngine });

      try {
        const bytes = await renderer.render(htmlFile, bookDir, 'body {}');

        expect(Buffer.from(bytes).equals(Buffer.from(fixture))).toBe(true);
        const rendered = await PDFDocument.load(bytes);
        expect(rendered.getPages().map((page) => page.getWidth())).toEqual([321]);
      } finally {
        await renderer.close();
      }
    });

    it('writes each style sheet once, passes the base URL and cleans up on close', async () => {
      const calls = join(root, 'calls.txt');
      await outputFile(calls, '');
      const renderer = new WeasyPrintRenderer({ command: okEngine });

      await renderer.render(htmlFile, bookDir, '@page { size: A4; }');
      await renderer.render(htmlFile, bookDir, '@page { size: A4; }');
      await renderer.render(htmlFile, bookDir, '@page { size: A5; }');

      const invocations = (await readLines(calls)).map((line) => line.split(' '));
      expect(invocations).toHaveLength(3);
      const [first, second, third] = invocations.map((args) => args[0] ?? '');
      expect(second).toBe(first);
      expect(third).not.toBe(first);
      expect(invocations.map((args) => args.slice(1))).toEqual([
        [bookDir, htmlFile],
        [bookDir, htmlFile],
        [bookDir, htmlFile],
      ]);
      expect(await readFile(first ?? '', 'utf8')).toBe('@page { size: A4; }');
      expect(await readFile(third ?? '', 'utf8')).toBe('@page { size: A5; }');

      const workDir = dirname(first ?? '');
      expect(await pathExists(workDir)).toBe(true);
      await renderer.close();
      expect(await pathExists(workDir)).toBe(false);
    });
  });

  it('turns a non-zero exit into a render failure carrying stderr', async () => {
    const renderer = new WeasyPrintRenderer({ command: badEngine });

    try {
      const failure = renderer.render(htmlFile, bookDir, 'body {}');
      await expect(failure).rejects.toBeInstanceOf(RenderFailedError);
      await expect(failure).rejects.toMatchObject({
        code: 'RENDER_FAILED',
        htmlFile,
        stderr: 'unsupported CSS at line 3\n',
        message: `Failed to render ${htmlFile}: unsupported CSS at line 3`,
      });
    } finally {
      await renderer.close();
    }
  });

  it('kills a render that runs past the timeout', async () => {
    const renderer = new WeasyPrintRenderer({ command: slowEngine, timeout: 100 });

    try {
      await expect(renderer.render(htmlFile, bookDir, 'body {}')).rejects.toMatchObject({
        code: 'RENDER_FAILED',
        stderr: '\nKilled by SIGTERM',
        message: `Failed to render ${htmlFile}: Killed by SIGTERM`,
      });
    } finally {
      await renderer.close();
    }
  });

  it('reports an engine that cannot be started as a render failure', async () => {
    const renderer = new WeasyPrintRenderer({ command: join(root, 'no-such-weasyprint') });

    try {
      await expect(renderer.render(htmlFile, bookDir, 'body {}')).rejects.toMatchObject({
        code: 'RENDER_FAILED',
        htmlFile,
      });
    } finally {
      await renderer.close();
    }
  });

  it('logs every engine invocation to the logger it is given', async () => {
    const logDir = join(root, 'logs');
    const logger = await Logger.getInstance(logDir);
    const command = join(root, 'missing-engine');
    const renderer = new WeasyPrintRenderer({ command, logger });

    try {
      await expect(renderer.render(htmlFile, bookDir, 'body {}')).rejects.toThrow(/ENOENT/);
    } finally {
      await renderer.close();
      await logger.close();
    }

    const commandLog = await readFile(join(logDir, 'commands.log'), 'utf8');
    expect(commandLog).toContain(`COMMAND_START: ${command} --stylesheet `);
    expect(commandLog).toContain(`--base-url ${bookDir} ${htmlFile} `);
    expect(commandLog).toContain(`COMMAND_END: ${command} - FAILED`);
  });

  it('can be closed before anything was rendered', async () => {
    await expect(new WeasyPrintRenderer().close()).resolves.toBeUndefined();
  });
});
