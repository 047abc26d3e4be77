export * from './token-counter.service';
