import { and, asc, desc, eq, type SQL } from 'drizzle-orm';
import type { NewTemplate, Template } from '../db/schema/templates.js';
import { templates } from '../db/schema/templates.js';
import type { Database } from '../types/database.js';
import type { TemplateFilter, TemplatePatch, TemplateRepository } from './types.js';

export class DrizzleTemplateRepository implements TemplateRepository {
  constructor(private db: Database) {}

  async save(record: NewTemplate): Promise<Template> {
    const { id: _id, createdAt: _createdAt, ...changes } = record;
    const [saved] = await this.db
      .insert(templates)
      .values(record)
      .onConflictDoUpdate({ target: templates.id, set: changes })
      .returning();
    if (!saved) {
      throw new Error(`Template ${record.name} was not written`);
    }
    return saved;
  }

  async update(id: string, patch: TemplatePatch): Promise<Template | undefined> {
    const [updated] = await this.db
      .update(templates)
      .set({ ...patch, updatedAt: patch.updatedAt ?? new Date().toISOString() })
      .where(eq(templates.id, id))
      .returning();
    return updated;
  }

  async findById(id: string): Promise<Template | undefined> {
    return this.db.query.templates.findFirst({ where: eq(templates.id, id) });
  }

  /** All versions of a template, newest first. */
  async findByName(name: string): Promise<Template[]> {
    return this.db.query.templates.findMany({
      where: eq(templates.name, name),
      orderBy: [desc(templates.version)],
    });
  }

  async list(filter: TemplateFilter = {}): Promise<Template[]> {
    const conditions: SQL[] = [];
    if (filter.status) {
      conditions.push(eq(templates.status, filter.status));
    }
    if (filter.name) {
      conditions.push(eq(templates.name, filter.name));
    }

    return this.db.query.templates.findMany({
      where: conditions.length > 0 ? and(...conditions) : undefined,
      orderBy: [asc(templates.name), desc(templates.version)],
      limit: filter.limit ?? 50,
      offset: filter.offset ?? 0,
    });
  }

  async delete(id: string): Promise<boolean> {
    const removed = await this.db
      .delete(templates)
      .where(eq(templates.id, id))
      .returning({ id: templates.id });
    return removed.length > 0;
  }
}
