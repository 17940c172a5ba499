export { DrizzleEnvironmentRepository } from './environment.repository.js';
export { DrizzleTemplateRepository } from './template.repository.js';
export * from './types.js';
export { DrizzleUserRepository } from './user.repository.js';
