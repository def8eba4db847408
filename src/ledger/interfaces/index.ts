export * from './ledger.interface';
