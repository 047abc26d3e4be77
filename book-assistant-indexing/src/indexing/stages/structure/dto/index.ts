export * from './structure-input.dto';
export * from './structure-output.dto';
