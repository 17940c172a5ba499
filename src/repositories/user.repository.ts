import { eq } from 'drizzle-orm';
import type { NewUser, User } from '../db/schema/users.js';
import { users } from '../db/schema/users.js';
import type { Database } from '../types/database.js';
import type { UserRepository } from './types.js';

export class DrizzleUserRepository implements UserRepository {
  constructor(private db: Database) {}

  async save(record: NewUser): Promise<User> {
    const { id: _id, createdAt: _createdAt, ...changes } = record;
    const [saved] = await this.db
      .insert(users)
      .values(record)
      .onConflictDoUpdate({ target: users.id, set: changes })
      .returning();
    if (!saved) {
      throw new Error(`User ${record.name} was not written`);
    }
    return saved;
  }

  async findById(id: string): Promise<User | undefined> {
    return this.db.query.users.findFirst({ where: eq(users.id, id) });
  }

  async findByName(name: string): Promise<User | undefined> {
    return this.db.query.users.findFirst({ where: eq(users.name, name) });
  }

  async delete(id: string): Promise<boolean> {
    const removed = await this.db
      .delete(users)
      .where(eq(users.id, id))
      .returning({ id: users.id });
    return removed.length > 0;
  }
}
