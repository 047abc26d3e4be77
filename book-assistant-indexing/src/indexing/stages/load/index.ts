export * from './load-stage.module';
export * from './load.stage';
export * from './services';
export * from './types';
export * from './dto';
export * from './errors/load-errors';
