export * from './retrieval-errors';
