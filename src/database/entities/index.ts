export * from './ledger-record.entity';
