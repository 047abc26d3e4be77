export * from './extract-types';
