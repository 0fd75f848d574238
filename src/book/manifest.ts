import { pathExists, readJson } from 'fs-extra/esm';
import { InvalidManifestError } from '../errors.js';

/**
 * Reads a chapter manifest: either a JSON array of HTML file names, or an
 * object whose `chapters` property is that array. Order in the file is reading order.
 */
export async function loadManifest(manifestPath: string): Promise<string[]> {
  if (!(await pathExists(manifestPath))) {
    throw new InvalidManifestError(manifestPath, 'file does not exist');
  }

  let content: unknown;
  try {
    content = await readJson(manifestPath);
  } catch (error) {
    throw new InvalidManifestError(manifestPath, error instanceof Error ? error.message : String(error));
  }

  const entries = Array.isArray(content) ? content : chaptersOf(content);
  if (!entries) {
    throw new InvalidManifestError(manifestPath, 'expected an array of file names or an object with a "chapters" array');
  }

  const fileNames: string[] = [];
  for (const [index, entry] of entries.entries()) {
    if (typeof entry !== 'string') {
      throw new InvalidManifestError(manifestPath, `entry ${index} must be a string`);
    }
    fileNames.push(entry);
  }

  return fileNames;
}

function chaptersOf(content: unknown): unknown[] | undefined {
  if (typeof content !== 'object' || content === null || !('chapters' in content)) {
    return undefined;
  }
  return Array.isArray(content.chapters) ? content.chapters : undefined;
}
