export * from './load-types';
