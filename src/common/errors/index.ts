export * from './publisher.errors';
