import { and, asc, eq, inArray, lte, ne, type SQL, sql } from 'drizzle-orm';
import type { Environment, NewEnvironment } from '../db/schema/environments.js';
import { environments } from '../db/schema/environments.js';
import type { Database } from '../types/database.js';
import { escapeLike } from './escape-like.js';
import type { EnvironmentFilter, EnvironmentPatch, EnvironmentRepository } from './types.js';

const notDeleted = ne(environments.status, 'deleted');

export class DrizzleEnvironmentRepository implements EnvironmentRepository {
  constructor(private db: Database) {}

  async save(record: NewEnvironment): Promise<Environment> {
    const { id: _id, createdAt: _createdAt, ...changes } = record;
    const [saved] = await this.db
      .insert(environments)
      .values(record)
      .onConflictDoUpdate({ target: environments.id, set: changes })
      .returning();
    if (!saved) {
      throw new Error(`Environment ${record.name} was not written`);
    }
    return saved;
  }

  async update(id: string, patch: EnvironmentPatch): Promise<Environment | undefined> {
    const [updated] = await this.db
      .update(environments)
      .set({ ...patch, updatedAt: patch.updatedAt ?? new Date().toISOString() })
      .where(eq(environments.id, id))
      .returning();
    return updated;
  }

  async findById(id: string): Promise<Environment | undefined> {
    return this.db.query.environments.findFirst({ where: eq(environments.id, id) });
  }

  async findByName(name: string): Promise<Environment | undefined> {
    return this.db.query.environments.findFirst({
      where: and(eq(environments.name, name), notDeleted),
    });
  }

  async findByNamespacePrefix(prefix: string): Promise<Environment[]> {
    return this.db.query.environments.findMany({
      where: and(
        sql`${environments.namespace} LIKE ${`${escapeLike(prefix)}%`} ESCAPE '\\'`,
        notDeleted
      ),
      orderBy: [asc(environments.namespace)],
    });
  }

  async findExpired(now: Date): Promise<Environment[]> {
    return this.db.query.environments.findMany({
      where: and(lte(environments.expiresAt, now.toISOString()), notDeleted),
      orderBy: [asc(environments.expiresAt)],
    });
  }

  async findByTemplate(templateId: string): Promise<Environment[]> {
    return this.db.query.environments.findMany({
      where: and(eq(environments.templateId, templateId), notDeleted),
    });
  }

  async list(filter: EnvironmentFilter = {}): Promise<Environment[]> {
    const conditions: SQL[] = [];

    if (filter.status !== undefined) {
      const statuses = Array.isArray(filter.status) ? filter.status : [filter.status];
      conditions.push(inArray(environments.status, statuses));
    } else if (!filter.includeDeleted) {
      conditions.push(notDeleted);
    }
    if (filter.userId) {
      conditions.push(eq(environments.userId, filter.userId));
    }
    if (filter.templateId) {
      conditions.push(eq(environments.templateId, filter.templateId));
    }

    return this.db.query.environments.findMany({
      where: conditions.length > 0 ? and(...conditions) : undefined,
      orderBy: [asc(environments.createdAt), asc(environments.name)],
      limit: filter.limit,
      offset: filter.offset,
    });
  }

  async delete(id: string): Promise<boolean> {
    const removed = await this.db
      .delete(environments)
      .where(eq(environments.id, id))
      .returning({ id: environments.id });
    return removed.length > 0;
  }
}
