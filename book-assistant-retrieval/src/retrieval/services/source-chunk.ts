import type { ScoredChunk, SourceChunk } from '../types';

/**
 * Copy of a scored chunk without its embedding vector
 */
export function toSourceChunk(chunk: ScoredChunk): SourceChunk {
  if (chunk.type === 'paragraph') {
    const { embedding: _embedding, ...source } = chunk;
    return source;
  }
  const { embedding: _embedding, ...source } = chunk;
  return source;
}
