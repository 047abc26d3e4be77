/**
 * Resolve Stage Barrel Export
 */

export * from './resolve-stage.module';
export * from './chapter-title.resolver';
export * from './matchers';
export * from './parsers';
export * from './types';
export * from './errors/resolve-errors';
