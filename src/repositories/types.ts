import type { Environment, NewEnvironment } from '../db/schema/environments.js';
import type { NewTemplate, Template, TemplateStatus } from '../db/schema/templates.js';
import type { NewUser, User } from '../db/schema/users.js';
import type { EnvironmentState } from '../lib/state-machines/environment-lifecycle/types.js';

export type EnvironmentFilter = {
  status?: EnvironmentState | EnvironmentState[];
  userId?: string;
  templateId?: string;
  /** Include environments already in `deleted`. Defaults to false. */
  includeDeleted?: boolean;
  limit?: number;
  offset?: number;
};

export type EnvironmentPatch = Partial<Omit<Environment, 'id' | 'createdAt'>>;

/**
 * Persistence boundary for environments. Lookups by name or namespace
 * ignore `deleted` rows, since names are only unique among live ones.
 */
export interface EnvironmentRepository {
  save(record: NewEnvironment): Promise<Environment>;
  update(id: string, patch: EnvironmentPatch): Promise<Environment | undefined>;
  findById(id: string): Promise<Environment | undefined>;
  findByName(name: string): Promise<Environment | undefined>;
  findByNamespacePrefix(prefix: string): Promise<Environment[]>;
  findExpired(now: Date): Promise<Environment[]>;
  findByTemplate(templateId: string): Promise<Environment[]>;
  list(filter?: EnvironmentFilter): Promise<Environment[]>;
  delete(id: string): Promise<boolean>;
}

export type TemplateFilter = {
  status?: TemplateStatus;
  name?: string;
  limit?: number;
  offset?: number;
};

export type TemplatePatch = Partial<Omit<Template, 'id' | 'createdAt'>>;

export interface TemplateRepository {
  save(record: NewTemplate): Promise<Template>;
  update(id: string, patch: TemplatePatch): Promise<Template | undefined>;
  findById(id: string): Promise<Template | undefined>;
  findByName(name: string): Promise<Template[]>;
  list(filter?: TemplateFilter): Promise<Template[]>;
  delete(id: string): Promise<boolean>;
}

export interface UserRepository {
  save(record: NewUser): Promise<User>;
  findById(id: string): Promise<User | undefined>;
  findByName(name: string): Promise<User | undefined>;
  delete(id: string): Promise<boolean>;
}
