export * from './flatten-stage.module';
export * from './flatten.stage';
export * from './paragraph-flattener';
export * from './services';
export * from './types';
export * from './errors/flatten-errors';
