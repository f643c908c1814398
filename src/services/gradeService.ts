/**
 * Grade Service
 *
 * Organizers grade the participants enrolled in their classes; participants
 * read their own grades. Grading is an upsert keyed by
 * (assignment, participant), so grading twice updates one record.
 */

import { ServiceContext, optionalText, policyContext, requireAssignment, requireClass } from "./context";
import { NotificationService } from "./notificationService";
import { assertAllowed } from "../domain/policy";
import { Assignment } from "../domain/assignment";
import { Class } from "../domain/class";
import { AuthorizationError, ValidationError } from "../domain/errors";
import { Grade, GradeView, MAX_RATING, MIN_RATING } from "../domain/grade";
import { PublicUser, toPublicUser, User } from "../domain/user";

export interface GradeInput {
  score?: unknown;
  feedback?: unknown;
  rating?: unknown;
}

export interface BulkGradeEntry extends GradeInput {
  participantId?: unknown;
}

export interface GradeSheet {
  class: Class;
  assignments: Pick<Assignment, "id" | "title" | "category" | "dueAt">[];
  // One row per enrolled participant; grades[i] belongs to assignments[i]
  rows: { participant: PublicUser; grades: (Grade | null)[] }[];
}

interface ValidGrade {
  participantId: string;
  score: number;
  feedback: string;
  rating?: number | null;
}

function readScore(value: unknown): number {
  const score = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof score !== "number" || !Number.isFinite(score)) {
    throw new ValidationError("Score must be a number");
  }
  return score;
}

/**
 * Absent or "" keeps the stored rating; null clears it
 */
function readRating(value: unknown): number | null | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  if (value === null) {
    return null;
  }
  const rating = typeof value === "string" ? Number(value) : value;
  if (
    typeof rating !== "number" ||
    !Number.isInteger(rating) ||
    rating < MIN_RATING ||
    rating > MAX_RATING
  ) {
    throw new ValidationError(`Rating must be a whole number from ${MIN_RATING} to ${MAX_RATING}`);
  }
  return rating;
}

function readGrade(participantId: string, input: GradeInput): ValidGrade {
  return {
    participantId,
    score: readScore(input.score),
    feedback: optionalText(input.feedback, "Feedback", 5000),
    rating: readRating(input.rating),
  };
}

export class GradeService {
  private notifications: NotificationService;

  constructor(private readonly ctx: ServiceContext) {
    this.notifications = new NotificationService(ctx);
  }

  private requireEnrolled(classObj: Class, participantId: string): void {
    if (!this.ctx.stores.enrollments.find(classObj.id, participantId)) {
      throw new AuthorizationError("Participant is not enrolled in this class");
    }
  }

  private write(actor: User, assignment: Assignment, entry: ValidGrade): Grade {
    const result = this.ctx.stores.grades.upsert(assignment.id, entry.participantId, {
      organizerId: actor.id,
      score: entry.score,
      feedback: entry.feedback,
      rating: entry.rating,
    });
    if (result.changed) {
      this.notifications.gradeUpdated(assignment, entry.participantId, entry.score);
    }
    return result.record;
  }

  /**
   * Grade one participant on one assignment
   */
  grade(actor: User, assignmentId: string, participantId: string, input: GradeInput): Grade {
    const { assignment, classObj } = requireAssignment(this.ctx, assignmentId);
    assertAllowed(actor, { kind: "grade:write", target: classObj }, policyContext(this.ctx));

    const entry = readGrade(participantId, input);
    this.requireEnrolled(classObj, participantId);
    return this.write(actor, assignment, entry);
  }

  /**
   * Grade several participants at once. Every entry is checked before any
   * grade is written.
   */
  gradeMany(actor: User, assignmentId: string, entries: unknown): Grade[] {
    const { assignment, classObj } = requireAssignment(this.ctx, assignmentId);
    assertAllowed(actor, { kind: "grade:write", target: classObj }, policyContext(this.ctx));

    if (!Array.isArray(entries) || entries.length === 0) {
      throw new ValidationError("grades must be a non-empty array");
    }

    const seen = new Set<string>();
    const valid: ValidGrade[] = entries.map((raw: unknown) => {
      if (
        typeof raw !== "object" ||
        raw === null ||
        !("participantId" in raw) ||
        typeof raw.participantId !== "string"
      ) {
        throw new ValidationError("Each grade needs a participantId");
      }
      const entry: BulkGradeEntry = raw;
      const participantId = raw.participantId;
      if (seen.has(participantId)) {
        throw new ValidationError(`Duplicate grade for participant ${participantId}`);
      }
      seen.add(participantId);
      this.requireEnrolled(classObj, participantId);
      return readGrade(participantId, entry);
    });

    return valid.map((entry) => this.write(actor, assignment, entry));
  }

  /**
   * The acting participant's grades across the classes they are currently
   * enrolled in, newest first
   */
  listOwn(actor: User): GradeView[] {
    const policy = policyContext(this.ctx);
    assertAllowed(actor, { kind: "grade:list-own" }, policy);

    const { stores } = this.ctx;
    const classIds = stores.enrollments.findByParticipant(actor.id).map((e) => e.classId);
    const classes = new Map(stores.classes.getByIds(classIds).map((c) => [c.id, c]));
    const grades = stores.grades.findByParticipant(actor.id);
    const assignments = new Map(
      stores.assignments.getByIds(grades.map((g) => g.assignmentId)).map((a) => [a.id, a])
    );

    const views: GradeView[] = [];
    for (const grade of grades) {
      const assignment = assignments.get(grade.assignmentId);
      const classObj = assignment ? classes.get(assignment.classId) : undefined;
      if (!assignment || !classObj) {
        continue; // Not enrolled any more
      }
      assertAllowed(actor, { kind: "grade:view-own", target: grade }, policy);

      const view: GradeView = {
        gradeId: grade.id,
        classId: classObj.id,
        className: classObj.name,
        assignmentId: assignment.id,
        assignmentTitle: assignment.title,
        score: grade.score,
        feedback: grade.feedback,
        gradedAt: grade.gradedAt,
        updatedAt: grade.updatedAt,
      };
      if (grade.rating !== undefined) {
        view.rating = grade.rating;
      }
      views.push(view);
    }

    return views.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  /**
   * Every enrolled participant's grade on every assignment of a class
   */
  gradeSheet(actor: User, classId: string): GradeSheet {
    const classObj = requireClass(this.ctx, classId);
    assertAllowed(actor, { kind: "grade:view-class", target: classObj }, policyContext(this.ctx));

    const { stores } = this.ctx;
    const assignments = stores.assignments.findByClass(classId);
    const grades = stores.grades.findByAssignments(assignments.map((a) => a.id));
    const byKey = new Map(grades.map((g) => [`${g.assignmentId}:${g.participantId}`, g]));
    const participants = stores.users.getByIds(
      stores.enrollments.findByClass(classId).map((e) => e.participantId)
    );

    return {
      class: classObj,
      assignments: assignments.map((a) => ({
        id: a.id,
        title: a.title,
        category: a.category,
        dueAt: a.dueAt,
      })),
      rows: participants
        .sort((a, b) => a.lastName.localeCompare(b.lastName))
        .map((participant) => ({
          participant: toPublicUser(participant),
          grades: assignments.map((a) => byKey.get(`${a.id}:${participant.id}`) ?? null),
        })),
    };
  }
}
