/**
 * Flatten Stage Error Classes
 */

/**
 * Base error for all flatten stage errors
 */
export class FlattenError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'FlattenError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class TokenizerError extends FlattenError {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message, 'FLATTEN_TOKENIZER_ERROR');
    this.name = 'TokenizerError';
  }
}
