export * from './run-summary.interface';
