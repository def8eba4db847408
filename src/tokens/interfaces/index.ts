export * from './token-store.interface';
