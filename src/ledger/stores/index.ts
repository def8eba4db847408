export * from './csv-ledger.store';
export * from './typeorm-ledger.store';
export * from './in-memory-ledger.store';
