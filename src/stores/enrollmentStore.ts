/**
 * Enrollment Store
 *
 * Persists enrollments in enrollments.json.
 * A (classId, participantId) pair appears at most once; create() checks and
 * writes in one synchronous step, so a second concurrent enroll gets a
 * ConflictError instead of a duplicate row.
 */

import { randomUUID } from "crypto";
import { JsonTable } from "./jsonTable";
import { ConflictError } from "../domain/errors";
import { CreateEnrollmentInput, Enrollment } from "../domain/enrollment";

export class EnrollmentStore {
  private table: JsonTable<Enrollment>;

  constructor(dataDir: string) {
    this.table = new JsonTable<Enrollment>(dataDir, "enrollments.json");
  }

  create(input: CreateEnrollmentInput): Enrollment {
    const enrollments = this.table.read();

    const existing = enrollments.find(
      (e) => e.classId === input.classId && e.participantId === input.participantId
    );
    if (existing) {
      throw new ConflictError("Participant is already enrolled in this class");
    }

    const enrollment: Enrollment = {
      id: randomUUID(),
      classId: input.classId,
      participantId: input.participantId,
      enrolledAt: new Date().toISOString(),
      enrolledBy: input.enrolledBy,
    };

    enrollments.push(enrollment);
    this.table.write(enrollments);
    return enrollment;
  }

  find(classId: string, participantId: string): Enrollment | null {
    return (
      this.table
        .read()
        .find((e) => e.classId === classId && e.participantId === participantId) || null
    );
  }

  findByClass(classId: string): Enrollment[] {
    return this.table.read().filter((e) => e.classId === classId);
  }

  findByParticipant(participantId: string): Enrollment[] {
    return this.table.read().filter((e) => e.participantId === participantId);
  }

  /**
   * Remove one enrollment. Returns false if the pair was not enrolled.
   */
  delete(classId: string, participantId: string): boolean {
    const enrollments = this.table.read();
    const remaining = enrollments.filter(
      (e) => !(e.classId === classId && e.participantId === participantId)
    );
    if (remaining.length === enrollments.length) {
      return false;
    }

    this.table.write(remaining);
    return true;
  }

  /**
   * Remove every enrollment of a class. Returns the number removed.
   */
  deleteByClass(classId: string): number {
    const enrollments = this.table.read();
    const remaining = enrollments.filter((e) => e.classId !== classId);
    const removed = enrollments.length - remaining.length;
    if (removed > 0) {
      this.table.write(remaining);
    }
    return removed;
  }
}
