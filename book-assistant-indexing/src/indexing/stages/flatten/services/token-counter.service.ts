import { Injectable } from '@nestjs/common';
import { getEncoding, type Tiktoken } from 'js-tiktoken';
import { TokenizerError } from '../errors/flatten-errors';

const PARAGRAPH_ENCODING = 'cl100k_base';

let sharedEncoding: Tiktoken | null = null;

function loadEncoding(): Tiktoken {
  if (!sharedEncoding) {
    try {
      sharedEncoding = getEncoding(PARAGRAPH_ENCODING);
    } catch (error) {
      throw new TokenizerError(
        `Failed to load ${PARAGRAPH_ENCODING} encoding`,
        error instanceof Error ? error : undefined,
      );
    }
  }
  return sharedEncoding;
}

/**
 * Token Counter Service
 * Paragraph lengths in cl100k_base tokens, used for the minimum paragraph size
 */
@Injectable()
export class TokenCounterService {
  countTokens(text: string): number {
    if (text.length === 0) {
      return 0;
    }
    try {
      return loadEncoding().encode(text).length;
    } catch (error) {
      if (error instanceof TokenizerError) {
        throw error;
      }
      throw new TokenizerError(
        `Failed to count tokens for text of length ${text.length}`,
        error instanceof Error ? error : undefined,
      );
    }
  }
}
