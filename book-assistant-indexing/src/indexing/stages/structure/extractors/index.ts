export * from './content-extractor';
