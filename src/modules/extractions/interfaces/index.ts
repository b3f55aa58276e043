export * from './export.interface';
export * from './extraction-reply.interface';
export * from './extraction-result.interface';
