import { createId } from '@paralleldrive/cuid2';
import { sql } from 'drizzle-orm';
import { sqliteTable, text } from 'drizzle-orm/sqlite-core';
import type { ResourceRef } from '../../lib/manifests/types.js';
import type { QuotaPolicy } from '../../lib/quota/types.js';
import type { EnvironmentState } from '../../lib/state-machines/environment-lifecycle/types.js';
import { templates } from './templates.js';
import { users } from './users.js';

/**
 * One provisioned sandbox. `resources` lists the cluster objects this
 * environment created and has not yet confirmed removed.
 */
export const environments = sqliteTable('environments', {
  id: text('id')
    .primaryKey()
    .$defaultFn(() => createId()),

  userId: text('user_id')
    .notNull()
    .references(() => users.id),

  templateId: text('template_id')
    .notNull()
    .references(() => templates.id),

  name: text('name').notNull(),

  namespace: text('namespace').notNull(),

  status: text('status').$type<EnvironmentState>().default('pending').notNull(),

  statusMessage: text('status_message'),

  gitRepositoryUrl: text('git_repository_url'),

  gitBranch: text('git_branch'),

  quota: text('quota', { mode: 'json' }).$type<QuotaPolicy>().notNull(),

  ports: text('ports', { mode: 'json' }).$type<number[]>().default([]).notNull(),

  envVars: text('env_vars', { mode: 'json' })
    .$type<Record<string, string>>()
    .default({})
    .notNull(),

  image: text('image').notNull(),

  accessUrl: text('access_url'),

  resources: text('resources', { mode: 'json' }).$type<ResourceRef[]>().default([]).notNull(),

  expiresAt: text('expires_at').notNull(),

  provisioningStartedAt: text('provisioning_started_at'),

  createdAt: text('created_at').default(sql`(datetime('now'))`).notNull(),

  updatedAt: text('updated_at').default(sql`(datetime('now'))`).notNull(),

  deletedAt: text('deleted_at'),
});

export type Environment = typeof environments.$inferSelect;
export type NewEnvironment = typeof environments.$inferInsert;
