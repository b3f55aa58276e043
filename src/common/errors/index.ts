export * from './extraction.errors';
