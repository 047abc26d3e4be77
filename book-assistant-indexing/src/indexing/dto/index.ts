export * from './index-library.dto';
export * from './indexing-report.dto';
