import { InvalidPageSizeError } from '../errors.js';
import { PageSize } from './types.js';

export const PAGE_SIZES: Record<string, readonly [width: number, height: number]> = {
  A4: [210, 297],
  A5: [148, 210],
  Letter: [215.9, 279.4],
  Legal: [215.9, 355.6],
  Tabloid: [279.4, 431.8],
};

// 595px × 841px is A4 at the 96 DPI CSS reference pixel, the size chapters are laid out for
export const INTRINSIC_PAGE_SIZE = '595px 841px';

export function resolvePageSize(pageSize?: PageSize): string {
  if (pageSize === undefined) {
    return INTRINSIC_PAGE_SIZE;
  }

  if (typeof pageSize === 'string') {
    const preset = Object.hasOwn(PAGE_SIZES, pageSize) ? PAGE_SIZES[pageSize] : undefined;
    if (preset) {
      return millimetres(preset[0], preset[1]);
    }

    const raw = pageSize.trim();
    if (raw === '') {
      throw new InvalidPageSizeError('empty size');
    }
    return raw;
  }

  const [width, height] = pageSize;
  return millimetres(width, height);
}

export function buildStyleDirective(size: string, margin: string): string {
  return [
    '@page {',
    `  size: ${size};`,
    `  margin: ${margin};`,
    '}',
    'html, body {',
    '  margin: 0;',
    '  padding: 0;',
    '}',
  ].join('\n');
}

/**
 * Reads a page size given on the command line: `<width>x<height>` in
 * millimetres becomes a numeric pair, anything else stays a string.
 */
export function parsePageSize(value: string): PageSize {
  const match = value.trim().match(/^(\d+(?:\.\d+)?)\s*x\s*(\d+(?:\.\d+)?)$/i);
  if (!match || !match[1] || !match[2]) {
    return value;
  }
  return [parseFloat(match[1]), parseFloat(match[2])];
}

function millimetres(width: number, height: number): string {
  for (const dimension of [width, height]) {
    if (!Number.isFinite(dimension) || dimension <= 0) {
      throw new InvalidPageSizeError(`${dimension} is not a positive length`);
    }
  }
  return `${width}mm ${height}mm`;
}
