export type BinderyErrorCode =
  | 'MISSING_OUTPUT_ROOT'
  | 'DIRECTORY_NOT_FOUND'
  | 'NO_BOOKS_FOUND'
  | 'NO_HTML_FILES'
  | 'INVALID_MANIFEST'
  | 'INVALID_PAGE_SIZE'
  | 'RENDER_FAILED';

export class BinderyError extends Error {
  readonly code: BinderyErrorCode;

  constructor(code: BinderyErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MissingOutputRootError extends BinderyError {
  constructor(readonly outputDir: string) {
    super('MISSING_OUTPUT_ROOT', `Output folder does not exist: ${outputDir}. Download a book into it first.`);
  }
}

export class DirectoryNotFoundError extends BinderyError {
  constructor(readonly dir: string) {
    super('DIRECTORY_NOT_FOUND', `Directory not found: ${dir}`);
  }
}

export class NoBooksFoundError extends BinderyError {
  constructor(readonly outputDir: string) {
    super('NO_BOOKS_FOUND', `No subdirectories found in ${outputDir}`);
  }
}

export class NoHtmlFilesError extends BinderyError {
  constructor(readonly dir: string) {
    super('NO_HTML_FILES', `No HTML files found in ${dir}`);
  }
}

export class InvalidManifestError extends BinderyError {
  constructor(readonly manifestPath: string, reason: string) {
    super('INVALID_MANIFEST', `Invalid manifest ${manifestPath}: ${reason}`);
  }
}

export class InvalidPageSizeError extends BinderyError {
  constructor(reason: string) {
    super('INVALID_PAGE_SIZE', `Invalid page size: ${reason}`);
  }
}

export class RenderFailedError extends BinderyError {
  constructor(readonly htmlFile: string, readonly stderr: string) {
    super('RENDER_FAILED', `Failed to render ${htmlFile}: ${stderr.trim()}`);
  }
}
