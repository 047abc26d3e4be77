export * from './catalog-builder';
export * from './corpus-writer.service';
