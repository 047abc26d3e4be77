export * from './extract-stage.module';
export * from './chapter-extraction.service';
export * from './chapter-label';
export * from './types';
