/**
 * Provider Types and Configurations
 */

export type EmbeddingProvider = 'ollama' | 'openai' | 'google';

export function isEmbeddingProvider(value: unknown): value is EmbeddingProvider {
  return value === 'ollama' || value === 'openai' || value === 'google';
}

export interface EmbeddingModelRef {
  provider: EmbeddingProvider;
  model: string;
}

export type LLMProvider = 'openai' | 'google' | 'anthropic' | 'ollama';

export function isLLMProvider(value: unknown): value is LLMProvider {
  return (
    value === 'openai' ||
    value === 'google' ||
    value === 'anthropic' ||
    value === 'ollama'
  );
}

/**
 * Chat Model Options
 */
export interface ChatModelOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
}
