export * from './persist.stage';
export * from './persist-stage.module';
export * from './dto';
export * from './errors';
export * from './types';
export * from './services';
