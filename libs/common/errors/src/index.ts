export * from './error-codes';
export * from './media-platform-error';
export * from './errors-factory';
export * from './media-platform-error.filter';
