/**
 * Assignment Store
 *
 * Persists assignments in assignments.json.
 */

import { randomUUID } from "crypto";
import { JsonTable } from "./jsonTable";
import {
  Assignment,
  CreateAssignmentInput,
  UpdateAssignmentInput,
} from "../domain/assignment";

/**
 * Due date first (undated last), then creation order
 */
function byDueDate(a: Assignment, b: Assignment): number {
  if (a.dueAt && b.dueAt) {
    return a.dueAt.localeCompare(b.dueAt);
  }
  if (a.dueAt) return -1;
  if (b.dueAt) return 1;
  return a.createdAt.localeCompare(b.createdAt);
}

export class AssignmentStore {
  private table: JsonTable<Assignment>;

  constructor(dataDir: string) {
    this.table = new JsonTable<Assignment>(dataDir, "assignments.json");
  }

  create(input: CreateAssignmentInput): Assignment {
    const assignments = this.table.read();
    const assignment: Assignment = {
      id: randomUUID(),
      classId: input.classId,
      organizerId: input.organizerId,
      title: input.title,
      description: input.description,
      category: input.category,
      dueAt: input.dueAt,
      createdAt: new Date().toISOString(),
    };

    assignments.push(assignment);
    this.table.write(assignments);
    return assignment;
  }

  load(assignmentId: string): Assignment | null {
    return this.table.read().find((a) => a.id === assignmentId) || null;
  }

  update(assignmentId: string, input: UpdateAssignmentInput): Assignment | null {
    const assignments = this.table.read();
    const index = assignments.findIndex((a) => a.id === assignmentId);
    if (index === -1) {
      return null;
    }

    const existing = assignments[index];
    const updated: Assignment = {
      ...existing,
      title: input.title ?? existing.title,
      description: input.description ?? existing.description,
      category: input.category ?? existing.category,
      dueAt: input.dueAt !== undefined ? input.dueAt : existing.dueAt,
      updatedAt: new Date().toISOString(),
    };
    assignments[index] = updated;
    this.table.write(assignments);
    return updated;
  }

  delete(assignmentId: string): boolean {
    const assignments = this.table.read();
    const remaining = assignments.filter((a) => a.id !== assignmentId);
    if (remaining.length === assignments.length) {
      return false;
    }

    this.table.write(remaining);
    return true;
  }

  findByClass(classId: string): Assignment[] {
    return this.table
      .read()
      .filter((a) => a.classId === classId)
      .sort(byDueDate);
  }

  getByIds(assignmentIds: string[]): Assignment[] {
    const wanted = new Set(assignmentIds);
    return this.table.read().filter((a) => wanted.has(a.id));
  }

  /**
   * Remove every assignment of a class. Returns the removed ids so the caller
   * can cascade to submissions and grades.
   */
  deleteByClass(classId: string): string[] {
    const assignments = this.table.read();
    const removed = assignments.filter((a) => a.classId === classId).map((a) => a.id);
    if (removed.length > 0) {
      this.table.write(assignments.filter((a) => a.classId !== classId));
    }
    return removed;
  }
}
