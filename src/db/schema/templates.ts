import { createId } from '@paralleldrive/cuid2';
import { sql } from 'drizzle-orm';
import { integer, sqliteTable, text, unique } from 'drizzle-orm/sqlite-core';
import type { QuotaOverrides } from '../../lib/quota/types.js';
import type { StackConfig } from '../../lib/stacks/types.js';

export type TemplateStatus = 'draft' | 'active' | 'archived';

/**
 * Environment blueprints. A template referenced by a live environment is
 * never edited in place; edits become a new row with `version + 1`.
 */
export const templates = sqliteTable(
  'templates',
  {
    id: text('id')
      .primaryKey()
      .$defaultFn(() => createId()),

    name: text('name').notNull(),

    description: text('description'),

    version: integer('version').default(1).notNull(),

    parentId: text('parent_id'),

    status: text('status').$type<TemplateStatus>().default('draft').notNull(),

    baseImage: text('base_image').notNull(),

    stack: text('stack', { mode: 'json' }).$type<StackConfig>().notNull(),

    defaultQuota: text('default_quota', { mode: 'json' }).$type<QuotaOverrides>().default({}).notNull(),

    ports: text('ports', { mode: 'json' }).$type<number[]>().default([]).notNull(),

    envVars: text('env_vars', { mode: 'json' })
      .$type<Record<string, string>>()
      .default({})
      .notNull(),

    gitRepositoryUrl: text('git_repository_url'),

    gitBranch: text('git_branch'),

    // Set once an image exists under this tag.
    imageTag: text('image_tag'),

    createdAt: text('created_at').default(sql`(datetime('now'))`).notNull(),

    updatedAt: text('updated_at').default(sql`(datetime('now'))`).notNull(),
  },
  (table) => [unique('templates_name_version_unique').on(table.name, table.version)]
);

export type Template = typeof templates.$inferSelect;
export type NewTemplate = typeof templates.$inferInsert;
