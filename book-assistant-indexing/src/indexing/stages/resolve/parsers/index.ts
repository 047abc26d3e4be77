export * from './ai-response.parser';
