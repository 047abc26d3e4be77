export * from './llm.module';
export * from './llm-provider.factory';
export * from './text-completion.provider';
