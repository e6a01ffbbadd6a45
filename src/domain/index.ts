/**
 * Domain model exports.
 */

export * from './access';
export * from './errors';
export * from './idempotency';
export * from './naming';
export * from './paste';
