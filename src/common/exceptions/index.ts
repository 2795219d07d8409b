export * from './error-codes';
export * from './business.exception';
export * from './global-exception.filter';
