/**
 * Structure Stage Barrel Export
 */

export * from './structure-stage.module';
export * from './structure.stage';
export * from './extractors';
export * from './builders';
export * from './types';
export * from './dto';
export * from './errors/structure-errors';
