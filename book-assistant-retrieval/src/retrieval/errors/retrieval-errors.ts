/**
 * Retrieval Errors
 */

export class RetrievalError extends Error {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'RetrievalError';
  }
}

export class CorpusLoadError extends RetrievalError {
  constructor(
    public readonly corpusPath: string,
    details: string,
    originalError?: Error,
  ) {
    super(`Cannot load corpus ${corpusPath}: ${details}`, originalError);
    this.name = 'CorpusLoadError';
  }
}

export class EmbeddingFailedError extends RetrievalError {
  constructor(modelId: string, originalError?: Error) {
    super(
      `Query embedding failed (${modelId}): ${originalError?.message ?? 'unknown error'}`,
      originalError,
    );
    this.name = 'EmbeddingFailedError';
  }
}

export class UnsupportedEmbeddingModelError extends RetrievalError {
  constructor(
    public readonly modelId: string,
    public readonly supportedModelIds: readonly string[],
  ) {
    super(
      `Embedding model ${modelId} is not configured; use one of ${supportedModelIds.join(', ')}`,
    );
    this.name = 'UnsupportedEmbeddingModelError';
  }
}

export class EmbeddingDimensionMismatchError extends RetrievalError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    public readonly chunkIndex: number,
  ) {
    super(
      `Chunk ${chunkIndex} has a ${actual}-dimension embedding, query has ${expected}`,
    );
    this.name = 'EmbeddingDimensionMismatchError';
  }
}

export class InvalidRetrievalParamsError extends RetrievalError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRetrievalParamsError';
  }
}
