/**
 * User data access. Users are referenced by the audit fields of accounts
 * and journal entries.
 */

import { randomUUID } from "node:crypto";
import { eq } from "drizzle-orm";
import type { User } from "@tallybook/types";
import type { DataContext, Db } from "../context.js";
import { RepositoryError } from "../errors.js";
import { toUser } from "../mappers.js";
import { users } from "../schema.js";

export interface NewUser {
  readonly email: string;
  readonly firstName: string;
  readonly lastName: string;
}

export class UserRepository {
  private readonly db: Db;

  constructor(ctx: DataContext) {
    this.db = ctx.db;
  }

  /**
   * Create a user. Emails are stored lower-cased and must be unique.
   */
  async create(input: NewUser): Promise<User> {
    const email = input.email.trim().toLowerCase();

    return this.db.transaction(
      (tx) => {
        const existing = tx.select({ id: users.id }).from(users).where(eq(users.email, email)).get();
        if (existing !== undefined) {
          throw new RepositoryError("DUPLICATE_KEY", `A user with email "${email}" already exists`);
        }

        const row = {
          id: randomUUID(),
          email,
          firstName: input.firstName,
          lastName: input.lastName,
          created: new Date().toISOString(),
        };
        tx.insert(users).values(row).run();
        return toUser(row);
      },
      { behavior: "immediate" },
    );
  }

  async getById(id: string): Promise<User | undefined> {
    const row = this.db.select().from(users).where(eq(users.id, id)).get();
    return row === undefined ? undefined : toUser(row);
  }

  async getByEmail(email: string): Promise<User | undefined> {
    const row = this.db
      .select()
      .from(users)
      .where(eq(users.email, email.trim().toLowerCase()))
      .get();
    return row === undefined ? undefined : toUser(row);
  }
}
