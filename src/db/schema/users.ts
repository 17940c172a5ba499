import { createId } from '@paralleldrive/cuid2';
import { sql } from 'drizzle-orm';
import { sqliteTable, text } from 'drizzle-orm/sqlite-core';

/**
 * Sandbox users. Batch provisioning creates one per item with a generated
 * access code; re-running a batch reuses them by name.
 */
export const users = sqliteTable('users', {
  id: text('id')
    .primaryKey()
    .$defaultFn(() => createId()),

  name: text('name').notNull().unique(),

  accessCode: text('access_code').notNull(),

  createdAt: text('created_at').default(sql`(datetime('now'))`).notNull(),

  updatedAt: text('updated_at').default(sql`(datetime('now'))`).notNull(),
});

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
