export * from './resolve-types';
