/**
 * Text Completion Provider
 * Single-prompt completion capability used by the chapter resolver and the
 * chapter summarizer. Injected by token so tests can supply a stub.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import {
  HumanMessage,
  SystemMessage,
  type BaseMessage,
  type MessageContent,
} from '@langchain/core/messages';
import { LLMProviderFactory } from './llm-provider.factory';

export const TEXT_COMPLETION_PROVIDER = 'TEXT_COMPLETION_PROVIDER';

export interface TextCompletionOptions {
  systemInstructions?: string;
  timeoutMs?: number;
}

export interface TextCompletionProvider {
  complete(prompt: string, options?: TextCompletionOptions): Promise<string>;
}

export function messageContentToText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content.trim();
  }
  return content
    .map((part) =>
      part.type === 'text' && 'text' in part && typeof part.text === 'string'
        ? part.text
        : '',
    )
    .join('')
    .trim();
}

@Injectable()
export class ChatModelCompletionProvider implements TextCompletionProvider {
  private readonly logger = new Logger(ChatModelCompletionProvider.name);
  private model: BaseChatModel | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly llmProviderFactory: LLMProviderFactory,
  ) {}

  async complete(
    prompt: string,
    options: TextCompletionOptions = {},
  ): Promise<string> {
    const model = this.getModel();

    const messages: BaseMessage[] = [];
    if (options.systemInstructions) {
      messages.push(new SystemMessage(options.systemInstructions));
    }
    messages.push(new HumanMessage(prompt));

    const response = await model.invoke(messages, {
      timeout: options.timeoutMs,
    });

    return messageContentToText(response.content);
  }

  /**
   * Created on first use so a missing API key only fails the calls that need it
   */
  private getModel(): BaseChatModel {
    if (!this.model) {
      const { chat, modelName } = this.llmProviderFactory.createChatModel({
        temperature: parseFloat(
          this.configService.get<string>('LLM_TEMPERATURE') ?? '0',
        ),
        maxTokens: parseInt(
          this.configService.get<string>('LLM_MAX_TOKENS') ?? '1024',
          10,
        ),
      });
      this.model = chat;
      this.logger.log(`Text completion model initialized: [${modelName}]`);
    }
    return this.model;
  }
}
