/**
 * Grade Store
 *
 * Persists grades in grades.json, at most one per (assignmentId, participantId).
 * upsert() finds and writes in one synchronous step; there is no separate
 * "check then insert" path a concurrent request could slip between.
 */

import { randomUUID } from "crypto";
import { JsonTable } from "./jsonTable";
import { Grade, GradeFields } from "../domain/grade";
import { UpsertResult } from "./submissionStore";

function sameFields(grade: Grade, fields: GradeFields): boolean {
  return (
    grade.organizerId === fields.organizerId &&
    grade.score === fields.score &&
    grade.feedback === fields.feedback &&
    (fields.rating === undefined || grade.rating === (fields.rating ?? undefined))
  );
}

export class GradeStore {
  private table: JsonTable<Grade>;

  constructor(dataDir: string) {
    this.table = new JsonTable<Grade>(dataDir, "grades.json");
  }

  /**
   * Insert or update the grade for the pair. Grading again with the same
   * values leaves the stored record untouched.
   */
  upsert(assignmentId: string, participantId: string, fields: GradeFields): UpsertResult<Grade> {
    const grades = this.table.read();
    const now = new Date().toISOString();
    const index = grades.findIndex(
      (g) => g.assignmentId === assignmentId && g.participantId === participantId
    );

    if (index === -1) {
      const grade: Grade = {
        id: randomUUID(),
        assignmentId,
        participantId,
        organizerId: fields.organizerId,
        score: fields.score,
        feedback: fields.feedback,
        gradedAt: now,
        updatedAt: now,
      };
      if (typeof fields.rating === "number") {
        grade.rating = fields.rating;
      }
      grades.push(grade);
      this.table.write(grades);
      return { record: grade, created: true, changed: true, previous: null };
    }

    const previous = grades[index];
    if (sameFields(previous, fields)) {
      return { record: previous, created: false, changed: false, previous };
    }

    const updated: Grade = {
      ...previous,
      organizerId: fields.organizerId,
      score: fields.score,
      feedback: fields.feedback,
      updatedAt: now,
    };
    if (fields.rating === null) {
      delete updated.rating;
    } else if (fields.rating !== undefined) {
      updated.rating = fields.rating;
    }
    grades[index] = updated;
    this.table.write(grades);
    return { record: updated, created: false, changed: true, previous };
  }

  find(assignmentId: string, participantId: string): Grade | null {
    return (
      this.table
        .read()
        .find((g) => g.assignmentId === assignmentId && g.participantId === participantId) ||
      null
    );
  }

  findByAssignment(assignmentId: string): Grade[] {
    return this.table.read().filter((g) => g.assignmentId === assignmentId);
  }

  findByAssignments(assignmentIds: string[]): Grade[] {
    const wanted = new Set(assignmentIds);
    return this.table.read().filter((g) => wanted.has(g.assignmentId));
  }

  findByParticipant(participantId: string): Grade[] {
    return this.table.read().filter((g) => g.participantId === participantId);
  }

  /**
   * Remove all grades of the given assignments. Returns the number removed.
   */
  deleteByAssignments(assignmentIds: string[]): number {
    const doomed = new Set(assignmentIds);
    const grades = this.table.read();
    const remaining = grades.filter((g) => !doomed.has(g.assignmentId));
    const removed = grades.length - remaining.length;
    if (removed > 0) {
      this.table.write(remaining);
    }
    return removed;
  }
}
