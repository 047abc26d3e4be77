export * from './flatten-types';
