/**
 * LLM Provider Factory
 * Chat models behind the chapter resolver and the summarizer.
 * The provider comes from LLM_PROVIDER (openai | google | anthropic | ollama).
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';

export type LLMProvider = 'openai' | 'google' | 'anthropic' | 'ollama';

const DEFAULT_CHAT_MODELS: Record<LLMProvider, string> = {
  openai: 'gpt-4o-mini',
  google: 'gemini-2.5-flash-lite',
  anthropic: 'claude-3-5-haiku-latest',
  ollama: 'llama3',
};

const API_KEYS: Record<Exclude<LLMProvider, 'ollama'>, string> = {
  openai: 'OPENAI_API_KEY',
  google: 'GOOGLE_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

export function isLLMProvider(value: unknown): value is LLMProvider {
  return typeof value === 'string' && value in DEFAULT_CHAT_MODELS;
}

export interface ChatModelOptions {
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
}

export interface ConfiguredChatModel {
  chat: BaseChatModel;
  /** "provider/model", for logs */
  modelName: string;
}

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Timeouts are passed per call, not here
   */
  createChatModel(options: ChatModelOptions = {}): ConfiguredChatModel {
    const configured = this.configService.get<string>('LLM_PROVIDER');
    const provider: LLMProvider = isLLMProvider(configured)
      ? configured
      : 'ollama';
    const model = this.configService.get<string>(
      `${provider.toUpperCase()}_CHAT_MODEL`,
      DEFAULT_CHAT_MODELS[provider],
    );
    const temperature = options.temperature ?? 0;
    const maxTokens = options.maxTokens ?? 1024;
    const maxRetries = options.maxRetries ?? 2;
    const modelName = `${provider}/${model}`;

    this.logger.log(`Creating chat model: ${modelName}`);

    if (provider === 'ollama') {
      const chat = new ChatOllama({
        model,
        temperature,
        numPredict: maxTokens,
        baseUrl: this.configService.get<string>(
          'OLLAMA_BASE_URL',
          'http://localhost:11434',
        ),
      });
      return { chat, modelName };
    }

    const apiKey = this.configService.get<string>(API_KEYS[provider]);
    if (!apiKey) {
      throw new Error(
        `${API_KEYS[provider]} is required for ${provider} chat models`,
      );
    }

    switch (provider) {
      case 'openai':
        return {
          chat: new ChatOpenAI({
            model,
            temperature,
            maxTokens,
            maxRetries,
            apiKey,
            configuration: {
              baseURL: this.configService.get<string>(
                'OPENAI_BASE_URL',
                'https://api.openai.com/v1',
              ),
            },
          }),
          modelName,
        };
      case 'google':
        return {
          chat: new ChatGoogleGenerativeAI({
            model,
            temperature,
            maxOutputTokens: maxTokens,
            maxRetries,
            apiKey,
          }),
          modelName,
        };
      case 'anthropic':
        return {
          chat: new ChatAnthropic({
            model,
            temperature,
            maxTokens,
            maxRetries,
            apiKey,
          }) as unknown as BaseChatModel,
          modelName,
        };
    }
  }
}
