export * from './hierarchy-builder';
