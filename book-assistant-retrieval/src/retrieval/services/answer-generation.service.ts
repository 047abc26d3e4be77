/**
 * Answer Generation Service
 * Answers a question from numbered sources with the configured chat model.
 * Model failures never reach the caller; they become ANSWER_FAILURE_MESSAGE.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ChatPromptTemplate,
  MessagesPlaceholder,
} from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import {
  AIMessage,
  HumanMessage,
  type BaseMessage,
} from '@langchain/core/messages';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import { isLLMProvider, type LLMProvider } from '../providers/types';
import type { ChatTurn, SourceChunk } from '../types';
import {
  ANSWER_FAILURE_MESSAGE,
  ANSWER_SYSTEM_PROMPT,
  NO_INFORMATION_MESSAGE,
  formatSources,
} from './answer-prompts';

export interface GenerateAnswerParams {
  question: string;
  sources: readonly SourceChunk[];
  history?: readonly ChatTurn[];
}

const answerPrompt = ChatPromptTemplate.fromMessages([
  ['system', ANSWER_SYSTEM_PROMPT],
  new MessagesPlaceholder('history'),
  ['user', 'Sources:\n\n{sources}\n\nQuestion: {question}'],
]);

export function toChatMessages(history: readonly ChatTurn[]): BaseMessage[] {
  return history.map((turn) =>
    turn.role === 'user'
      ? new HumanMessage(turn.content)
      : new AIMessage(turn.content),
  );
}

@Injectable()
export class AnswerGenerationService {
  private readonly logger = new Logger(AnswerGenerationService.name);
  private readonly provider: LLMProvider | undefined;
  private readonly model: string | undefined;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly llmFactory: LLMProviderFactory,
  ) {
    const provider = this.configService.get<string>('ANSWER_PROVIDER');
    this.provider = isLLMProvider(provider) ? provider : undefined;
    this.model = this.configService.get<string>('ANSWER_MODEL') || undefined;
    this.temperature = parseFloat(
      this.configService.get<string>('ANSWER_TEMPERATURE') ?? '0.2',
    );
    this.maxTokens = parseInt(
      this.configService.get<string>('ANSWER_MAX_TOKENS') ?? '2048',
      10,
    );
    this.timeoutMs = parseInt(
      this.configService.get<string>('ANSWER_TIMEOUT_MS') ?? '60000',
      10,
    );
  }

  async generateAnswer(params: GenerateAnswerParams): Promise<string> {
    const { question, sources, history = [] } = params;

    if (sources.length === 0) {
      this.logger.log(
        '[Generate] stage=generate status=skipped reason=no_sources',
      );
      return NO_INFORMATION_MESSAGE;
    }

    const startTime = Date.now();

    try {
      const chat = this.llmFactory.createChatModel(this.provider, {
        model: this.model,
        temperature: this.temperature,
        maxTokens: this.maxTokens,
      });
      const chain = answerPrompt.pipe(chat).pipe(new StringOutputParser());

      const answer = await chain.invoke(
        {
          history: toChatMessages(history),
          sources: formatSources(sources),
          question,
        },
        { timeout: this.timeoutMs },
      );

      this.logger.log(
        `[Generate] stage=generate status=success sources=${sources.length} ` +
          `historyTurns=${history.length} duration=${Date.now() - startTime}ms`,
      );
      return answer.trim();
    } catch (error) {
      this.logger.error(
        `[Generate] stage=generate status=failed duration=${Date.now() - startTime}ms ` +
          `error=${error instanceof Error ? error.message : String(error)}`,
      );
      return ANSWER_FAILURE_MESSAGE;
    }
  }
}
