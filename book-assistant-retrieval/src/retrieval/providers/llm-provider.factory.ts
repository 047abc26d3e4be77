/**
 * LLM Provider Factory
 * Chat models for answer generation (OpenAI, Google, Anthropic, Ollama)
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { isLLMProvider, type LLMProvider, type ChatModelOptions } from './types';

const DEFAULT_CHAT_MODELS: Record<LLMProvider, string> = {
  openai: 'gpt-4o-mini',
  google: 'gemini-2.5-flash-lite',
  anthropic: 'claude-3-5-haiku-latest',
  ollama: 'llama3',
};

interface ResolvedChatOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  maxRetries: number;
}

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Falls back to LLM_PROVIDER, then ollama, when no provider is given.
   * Unset options come from `<PROVIDER>_CHAT_MODEL` and the defaults.
   */
  createChatModel(
    provider?: LLMProvider,
    options: ChatModelOptions = {},
  ): BaseChatModel {
    const selected = provider ?? this.getConfiguredProvider();
    const resolved: ResolvedChatOptions = {
      model:
        options.model ||
        this.configService.get<string>(
          `${selected.toUpperCase()}_CHAT_MODEL`,
          DEFAULT_CHAT_MODELS[selected],
        ),
      temperature: options.temperature ?? 0.2,
      maxTokens: options.maxTokens ?? 2048,
      maxRetries: options.maxRetries ?? 2,
    };

    this.logger.log(`Creating chat model: ${selected}/${resolved.model}`);

    switch (selected) {
      case 'openai':
        return new ChatOpenAI({
          model: resolved.model,
          temperature: resolved.temperature,
          maxTokens: resolved.maxTokens,
          maxRetries: resolved.maxRetries,
          apiKey: this.requireApiKey('OPENAI_API_KEY', selected),
          configuration: {
            baseURL: this.configService.get<string>(
              'OPENAI_BASE_URL',
              'https://api.openai.com/v1',
            ),
          },
        });
      case 'google':
        return new ChatGoogleGenerativeAI({
          model: resolved.model,
          temperature: resolved.temperature,
          maxOutputTokens: resolved.maxTokens,
          maxRetries: resolved.maxRetries,
          apiKey: this.requireApiKey('GOOGLE_API_KEY', selected),
        });
      case 'anthropic':
        return new ChatAnthropic({
          model: resolved.model,
          temperature: resolved.temperature,
          maxTokens: resolved.maxTokens,
          maxRetries: resolved.maxRetries,
          apiKey: this.requireApiKey('ANTHROPIC_API_KEY', selected),
        }) as unknown as BaseChatModel;
      case 'ollama':
        return new ChatOllama({
          model: resolved.model,
          temperature: resolved.temperature,
          numPredict: resolved.maxTokens,
          baseUrl: this.configService.get<string>(
            'OLLAMA_BASE_URL',
            'http://localhost:11434',
          ),
        });
    }
  }

  private getConfiguredProvider(): LLMProvider {
    const configured = this.configService.get<string>('LLM_PROVIDER');
    return isLLMProvider(configured) ? configured : 'ollama';
  }

  private requireApiKey(key: string, provider: LLMProvider): string {
    const apiKey = this.configService.get<string>(key);
    if (!apiKey) {
      throw new Error(`${key} is required for ${provider} chat models`);
    }
    return apiKey;
  }
}
