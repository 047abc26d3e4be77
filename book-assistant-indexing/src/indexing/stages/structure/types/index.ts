export * from './structure-types';
