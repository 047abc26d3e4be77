import { Module } from '@nestjs/common';
import { LLMProviderFactory } from './llm-provider.factory';
import {
  ChatModelCompletionProvider,
  TEXT_COMPLETION_PROVIDER,
} from './text-completion.provider';

@Module({
  providers: [
    LLMProviderFactory,
    {
      provide: TEXT_COMPLETION_PROVIDER,
      useClass: ChatModelCompletionProvider,
    },
  ],
  exports: [LLMProviderFactory, TEXT_COMPLETION_PROVIDER],
})
export class LlmModule {}
