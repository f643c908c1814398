/**
 * User Store
 *
 * Persists users in users.json. Usernames and emails are unique,
 * compared case-insensitively.
 */

import { randomUUID } from "crypto";
import { JsonTable } from "./jsonTable";
import { ConflictError } from "../domain/errors";
import { CreateUserInput, UpdateProfileInput, User } from "../domain/user";

function sameText(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

export class UserStore {
  private table: JsonTable<User>;

  constructor(dataDir: string) {
    this.table = new JsonTable<User>(dataDir, "users.json");
  }

  /**
   * Create a user. Throws ConflictError if the username or email is taken.
   */
  create(input: CreateUserInput): User {
    const users = this.table.read();

    if (users.some((u) => sameText(u.username, input.username))) {
      throw new ConflictError(`Username "${input.username}" is already taken`);
    }
    if (users.some((u) => sameText(u.email, input.email))) {
      throw new ConflictError(`Email "${input.email}" is already registered`);
    }

    const user: User = {
      id: randomUUID(),
      username: input.username,
      email: input.email,
      passwordHash: input.passwordHash,
      role: input.role,
      firstName: input.firstName,
      lastName: input.lastName,
      createdAt: new Date().toISOString(),
    };

    users.push(user);
    this.table.write(users);
    return user;
  }

  load(userId: string): User | null {
    return this.table.read().find((u) => u.id === userId) || null;
  }

  /**
   * Find a user by username (case-insensitive)
   */
  findByUsername(username: string): User | null {
    return this.table.read().find((u) => sameText(u.username, username)) || null;
  }

  getByIds(userIds: string[]): User[] {
    const wanted = new Set(userIds);
    return this.table.read().filter((u) => wanted.has(u.id));
  }

  /**
   * Update profile fields. Role is not an updatable field.
   */
  updateProfile(userId: string, input: UpdateProfileInput): User | null {
    const users = this.table.read();
    const index = users.findIndex((u) => u.id === userId);
    if (index === -1) {
      return null;
    }

    const { email } = input;
    if (email !== undefined && users.some((u) => u.id !== userId && sameText(u.email, email))) {
      throw new ConflictError(`Email "${email}" is already registered`);
    }

    const existing = users[index];
    const updated: User = {
      ...existing,
      email: input.email ?? existing.email,
      firstName: input.firstName ?? existing.firstName,
      lastName: input.lastName ?? existing.lastName,
    };
    users[index] = updated;
    this.table.write(users);
    return updated;
  }
}
