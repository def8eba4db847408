export * from './facebook-api.interface';
