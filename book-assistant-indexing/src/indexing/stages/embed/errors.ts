/**
 * Embed Stage Errors
 */

export class EmbedError extends Error {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'EmbedError';
  }
}

/**
 * Raised when not a single record of a book could be embedded
 */
export class EmbeddingFailedError extends EmbedError {
  constructor(
    public readonly bookTitle: string,
    public readonly failedCount: number,
    firstError: string,
  ) {
    super(
      `All ${failedCount} records of "${bookTitle}" failed to embed: ${firstError}`,
    );
    this.name = 'EmbeddingFailedError';
  }
}
