/**
 * Batch indexing errors
 */

export class LibraryReadError extends Error {
  constructor(
    public readonly inputDir: string,
    public readonly originalError?: Error,
  ) {
    super(
      `Cannot read library directory ${inputDir}: ${originalError?.message ?? 'unknown error'}`,
    );
    this.name = 'LibraryReadError';
  }
}
