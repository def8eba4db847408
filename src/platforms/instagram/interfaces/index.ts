export * from './instagram-api.interface';
export * from './instagram-config.interface';
