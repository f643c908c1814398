/**
 * Class Store
 *
 * Persists classes in classes.json.
 * Cascading deletes are coordinated by the services, which also own the
 * assignment, enrollment, submission and grade stores.
 */

import { randomUUID } from "crypto";
import { JsonTable } from "./jsonTable";
import { Class, CreateClassInput, UpdateClassInput } from "../domain/class";

export class ClassStore {
  private table: JsonTable<Class>;

  constructor(dataDir: string) {
    this.table = new JsonTable<Class>(dataDir, "classes.json");
  }

  create(input: CreateClassInput): Class {
    const classes = this.table.read();
    const classObj: Class = {
      id: randomUUID(),
      name: input.name,
      subject: input.subject,
      organizerId: input.organizerId,
      createdAt: new Date().toISOString(),
    };

    classes.push(classObj);
    this.table.write(classes);
    return classObj;
  }

  load(classId: string): Class | null {
    return this.table.read().find((c) => c.id === classId) || null;
  }

  update(classId: string, input: UpdateClassInput): Class | null {
    const classes = this.table.read();
    const index = classes.findIndex((c) => c.id === classId);
    if (index === -1) {
      return null;
    }

    const existing = classes[index];
    const updated: Class = {
      ...existing,
      name: input.name ?? existing.name,
      subject: input.subject ?? existing.subject,
      updatedAt: new Date().toISOString(),
    };
    classes[index] = updated;
    this.table.write(classes);
    return updated;
  }

  delete(classId: string): boolean {
    const classes = this.table.read();
    const remaining = classes.filter((c) => c.id !== classId);
    if (remaining.length === classes.length) {
      return false;
    }

    this.table.write(remaining);
    return true;
  }

  /**
   * All classes owned by an organizer, newest first
   */
  findByOrganizer(organizerId: string): Class[] {
    return this.table
      .read()
      .filter((c) => c.organizerId === organizerId)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  /**
   * Classes for the given ids, sorted by name
   */
  getByIds(classIds: string[]): Class[] {
    const wanted = new Set(classIds);
    return this.table
      .read()
      .filter((c) => wanted.has(c.id))
      .sort((a, b) => a.name.localeCompare(b.name));
  }
}
