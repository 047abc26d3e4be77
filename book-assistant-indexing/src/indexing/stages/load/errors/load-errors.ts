/**
 * Load Stage Errors
 */

/**
 * Base class for all Load Stage errors
 */
export abstract class LoadStageError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class FileNotFoundError extends LoadStageError {
  constructor(filePath: string) {
    super(`File not found at path: ${filePath}`, 'LOAD_FILE_NOT_FOUND');
  }
}

export class InvalidInputError extends LoadStageError {
  constructor(message: string) {
    super(message, 'LOAD_INVALID_INPUT');
  }
}

export class EpubReadError extends LoadStageError {
  constructor(
    filePath: string,
    details: string,
    public readonly originalError?: Error,
  ) {
    super(`Failed to read EPUB ${filePath}: ${details}`, 'LOAD_EPUB_READ');
  }
}

export class NoChaptersError extends LoadStageError {
  constructor(filePath: string) {
    super(`No readable chapters in ${filePath}`, 'LOAD_NO_CHAPTERS');
  }
}
