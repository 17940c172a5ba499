export * from './adapter-errors.js';
export * from './base.js';
export * from './batch-errors.js';
export * from './environment-errors.js';
export * from './k8s-errors.js';
export * from './quota-errors.js';
export * from './stack-errors.js';
export * from './template-errors.js';
export * from './validation-errors.js';
