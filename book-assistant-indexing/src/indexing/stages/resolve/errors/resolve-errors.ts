/**
 * Resolve Stage Error Definitions
 */

/**
 * Base Resolve Error
 */
export class ResolveError extends Error {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'ResolveError';
  }
}

/**
 * AI Response Parse Error - Recoverable (Structural result kept)
 * Raised when the fallback model's reply is not a usable JSON object
 */
export class AiResponseParseError extends ResolveError {
  constructor(
    details: string,
    public readonly rawResponse: string,
    originalError?: Error,
  ) {
    super(`Could not parse chapter/title response: ${details}`, originalError);
    this.name = 'AiResponseParseError';
  }
}
