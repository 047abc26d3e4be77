/**
 * Structure Stage Error Definitions
 */

/**
 * Base Structure Error
 */
export class StructureError extends Error {
  constructor(
    public readonly href: string,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'StructureError';
  }
}

/**
 * Empty Chapter Error - Recoverable (Skip)
 * Raised when a chapter document yields no content items
 */
export class EmptyChapterError extends StructureError {
  constructor(href: string) {
    super(href, `Chapter ${href} has no extractable content. Skipping.`);
    this.name = 'EmptyChapterError';
  }
}
