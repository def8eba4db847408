export * from './platform.interface';
export * from './content.interface';
