export * from './load-corpus.node';
export * from './apply-criteria.node';
export * from './retrieve.node';
export * from './generate-answer.node';
