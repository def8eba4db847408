export * from './feed.interface';
