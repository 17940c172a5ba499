export * from './environments.js';
export * from './templates.js';
export * from './users.js';
