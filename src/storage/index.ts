/**
 * Storage exports.
 */

export * from './bootstrap';
export * from './commit-orchestrator';
export * from './draft-builder';
export * from './git-adapter';
export * from './idempotency-ledger';
export * from './metadata-reader';
export * from './repository-lock';
export * from './version-control';
