#!/usr/bin/env node

import { existsSync, realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import minimist from 'minimist';
import { bindBook } from './bindery.js';
import { Logger } from './logger/mod.js';
import { ConsoleProgressListener, events, MatrixProgressListener } from './events/mod.js';
import { WeasyPrintRenderer, WeasyPrintOptions } from './render/weasyprint.js';
import { DEFAULT_MERGE_OPTIONS, MergeOptions } from './pdf/types.js';
import { parsePageSize } from './pdf/page-size.js';

interface Args {
  'output-dir': string;
  'page-size'?: string;
  margin: string;
  manifest?: string;
  title?: string;
  concurrency: string;
  weasyprint: string;
  timeout?: string;
  'log-dir': string;
  matrix: boolean;
  help: boolean;
  _: string[];
}

export interface CliOptions {
  help: boolean;
  matrix: boolean;
  logDir: string;
  merge: MergeOptions;
  renderer: WeasyPrintOptions;
}

const HELP_TEXT = `
bindery - Merge a book's HTML chapters into a single PDF

USAGE:
    bindery [book-id] [options]

    Without a book id, the first book directory found in the output directory is used.
    Chapters are merged in file name order, so name them 001.html, 002.html, ...

OPTIONS:
    -o, --output-dir <dir>        Directory holding the book directories (default: output)
    -s, --page-size <size>        A4, A5, Letter, Legal, Tabloid, <w>x<h> in mm, or a CSS size
                                  (default: the content size, 595px 841px)
    -m, --margin <margin>         Page margin (default: 0)
    -f, --manifest <file>         JSON list of chapter files in reading order (default: none)
    -t, --title <title>           PDF title (default: book id)
    -c, --concurrency <num>       Number of chapters rendered at once (default: 1)
        --matrix                  Show visual progress matrix (default: false)
    -h, --help                    Show this help

ENGINE OPTIONS:
    --weasyprint <path>           WeasyPrint executable (default: weasyprint)
    --timeout <ms>                Kill a chapter render after this many milliseconds (default: none)
    --log-dir <dir>               Directory for bindery.log and commands.log (default: ./logs)

EXAMPLES:
    bindery 9781492052203
    bindery 9781492052203 -s A5 -m 12mm
    bindery -o downloads -s 150x220 -c 4 --matrix
    bindery 9781492052203 -f chapters.json
`;

function showHelp(): void {
  console.log(HELP_TEXT);
}

function showError(message: string): void {
  console.error(`Error: ${message}`);
  console.error('Use --help for usage information');
  process.exitCode = 1;
}

function parsePositiveInteger(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`--${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const args = minimist<Args>(argv, {
    alias: {
      o: 'output-dir',
      s: 'page-size',
      m: 'margin',
      f: 'manifest',
      t: 'title',
      c: 'concurrency',
      h: 'help',
    },
    boolean: ['help', 'matrix'],
    string: ['_', 'output-dir', 'page-size', 'margin', 'manifest', 'title', 'concurrency', 'weasyprint', 'timeout', 'log-dir'],
    default: {
      'output-dir': DEFAULT_MERGE_OPTIONS.outputDir,
      margin: DEFAULT_MERGE_OPTIONS.margin,
      concurrency: String(DEFAULT_MERGE_OPTIONS.concurrency),
      weasyprint: 'weasyprint',
      'log-dir': './logs',
      matrix: false,
    },
  });

  if (args._.length > 1) {
    throw new Error(`Expected at most one book id, got: ${args._.join(' ')}`);
  }

  return {
    help: args.help,
    matrix: args.matrix,
    logDir: args['log-dir'],
    merge: {
      outputDir: args['output-dir'],
      bookId: args._[0],
      pageSize: args['page-size'] ? parsePageSize(args['page-size']) : undefined,
      margin: args.margin,
      manifest: args.manifest,
      title: args.title,
      concurrency: parsePositiveInteger('concurrency', args.concurrency),
    },
    renderer: {
      command: args.weasyprint,
      timeout: args.timeout ? parsePositiveInteger('timeout', args.timeout) : undefined,
    },
  };
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    showError(error instanceof Error ? error.message : String(error));
    return;
  }

  if (options.help) {
    showHelp();
    return;
  }

  const logger = await Logger.getInstance(options.logDir);
  const consoleListener = new ConsoleProgressListener(options.matrix);
  const matrixListener = options.matrix ? new MatrixProgressListener() : null;
  const unsubscribeConsole = events.subscribe((event) => consoleListener.listen(event));
  const unsubscribeMatrix = matrixListener ? events.subscribe((event) => matrixListener.listen(event)) : null;
  const startTime = Date.now();

  logger.info('Merge started', { ...options.merge });

  try {
    const result = await bindBook(options.merge, new WeasyPrintRenderer({ ...options.renderer, logger }));

    if (result) {
      logger.info('PDF created', {
        outputPath: result.outputPath,
        totalPages: result.totalPages,
        chapters: result.chapters,
      });

      events.emit({
        type: 'processing:complete',
        outputPath: result.outputPath,
        stats: {
          totalChapters: result.chapters.length,
          totalPages: result.totalPages,
          elapsed: (Date.now() - startTime) / 1000,
        },
      });
    }
  } catch (error) {
    logger.error('Merge failed', error, { ...options.merge });
    showError(error instanceof Error ? error.message : String(error));
  } finally {
    unsubscribeConsole();
    if (unsubscribeMatrix) unsubscribeMatrix();
    await logger.close();
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  return script !== undefined && existsSync(script) && import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntryPoint()) {
  await main();
}
