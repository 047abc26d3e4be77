/**
 * Persist Stage Custom Errors
 */

export class PersistStageError extends Error {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'PersistStageError';
  }
}

export class CorpusWriteError extends PersistStageError {
  constructor(filePath: string, originalError?: Error) {
    super(
      `Corpus write failed for ${filePath}: ${originalError?.message ?? 'unknown error'}`,
      originalError,
    );
    this.name = 'CorpusWriteError';
  }
}
