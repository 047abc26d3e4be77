export * from './chapter-mapping';
export * from './epub-reader.service';
