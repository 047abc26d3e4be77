export * from './number-words';
export * from './chapter-heading.matcher';
