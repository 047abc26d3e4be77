export * from './corpus.types';
export * from './criteria.types';
export * from './chat.types';
