export * from './guards.js';
export * from './machine.js';
export * from './reconcile.js';
export * from './types.js';
