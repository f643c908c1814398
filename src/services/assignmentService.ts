/**
 * Assignment Service
 *
 * Organizers create and edit assignments in the classes they own; enrolled
 * participants read them. Creating an assignment notifies every participant
 * currently enrolled in the class.
 */

import {
  ServiceContext,
  optionalText,
  policyContext,
  requireAssignment,
  requireClass,
  requireText,
} from "./context";
import { discardArtifacts } from "./artifactCleanup";
import { NotificationService } from "./notificationService";
import { assertAllowed } from "../domain/policy";
import {
  Assignment,
  ASSIGNMENT_CATEGORIES,
  AssignmentCategory,
  isAssignmentCategory,
  parseDueDate,
  UpdateAssignmentInput,
} from "../domain/assignment";
import { Class } from "../domain/class";
import { NotFoundError, ValidationError } from "../domain/errors";
import { Grade } from "../domain/grade";
import { Submission } from "../domain/submission";
import { User } from "../domain/user";

export interface AssignmentInput {
  title?: unknown;
  description?: unknown;
  category?: unknown;
  dueDate?: unknown; // "YYYY-MM-DD" or ISO timestamp; empty clears it
}

export interface AssignmentDetail {
  assignment: Assignment;
  class: Class;
  // Participant view
  submission: Submission | null;
  grade: Grade | null;
  // Organizer view
  submissionCount: number | null;
  gradedCount: number | null;
}

export interface DeleteAssignmentResult {
  assignmentId: string;
  submissions: number;
  grades: number;
  artifacts: number;
}

function readCategory(value: unknown): AssignmentCategory {
  if (value === undefined || value === null || value === "") {
    return "homework";
  }
  if (!isAssignmentCategory(value)) {
    throw new ValidationError(`Category must be one of ${ASSIGNMENT_CATEGORIES.join(", ")}`);
  }
  return value;
}

function readDueDate(value: unknown): string | null {
  const dueAt = parseDueDate(value);
  if (dueAt === undefined) {
    throw new ValidationError("Due date must be YYYY-MM-DD or an ISO timestamp");
  }
  return dueAt;
}

export class AssignmentService {
  private notifications: NotificationService;

  constructor(private readonly ctx: ServiceContext) {
    this.notifications = new NotificationService(ctx);
  }

  create(actor: User, classId: string, input: AssignmentInput): Assignment {
    const classObj = requireClass(this.ctx, classId);
    assertAllowed(actor, { kind: "assignment:create", target: classObj }, policyContext(this.ctx));

    const assignment = this.ctx.stores.assignments.create({
      classId,
      organizerId: actor.id,
      title: requireText(input.title, "Title", { max: 200 }),
      description: optionalText(input.description, "Description", 10000),
      category: readCategory(input.category),
      dueAt: readDueDate(input.dueDate),
    });

    const participantIds = this.ctx.stores.enrollments
      .findByClass(classId)
      .map((e) => e.participantId);
    this.notifications.assignmentCreated(assignment, participantIds);

    return assignment;
  }

  update(actor: User, assignmentId: string, input: AssignmentInput): Assignment {
    const { classObj } = requireAssignment(this.ctx, assignmentId);
    assertAllowed(actor, { kind: "assignment:modify", target: classObj }, policyContext(this.ctx));

    const changes: UpdateAssignmentInput = {};
    if (input.title !== undefined) {
      changes.title = requireText(input.title, "Title", { max: 200 });
    }
    if (input.description !== undefined) {
      changes.description = optionalText(input.description, "Description", 10000);
    }
    if (input.category !== undefined) {
      changes.category = readCategory(input.category);
    }
    if (input.dueDate !== undefined) {
      changes.dueAt = readDueDate(input.dueDate);
    }

    const updated = this.ctx.stores.assignments.update(assignmentId, changes);
    if (!updated) {
      throw new NotFoundError("Assignment", assignmentId);
    }
    return updated;
  }

  async delete(actor: User, assignmentId: string): Promise<DeleteAssignmentResult> {
    const { classObj } = requireAssignment(this.ctx, assignmentId);
    assertAllowed(actor, { kind: "assignment:modify", target: classObj }, policyContext(this.ctx));

    const { stores } = this.ctx;
    const submissions = stores.submissions.deleteByAssignments([assignmentId]);
    const grades = stores.grades.deleteByAssignments([assignmentId]);
    stores.assignments.delete(assignmentId);

    const artifacts = await discardArtifacts(this.ctx.storage, submissions);
    return { assignmentId, submissions: submissions.length, grades, artifacts };
  }

  getDetail(actor: User, assignmentId: string): AssignmentDetail {
    const { assignment, classObj } = requireAssignment(this.ctx, assignmentId);
    assertAllowed(actor, { kind: "assignment:view", target: classObj }, policyContext(this.ctx));

    const { stores } = this.ctx;
    if (actor.role === "participant") {
      return {
        assignment,
        class: classObj,
        submission: stores.submissions.find(assignmentId, actor.id),
        grade: stores.grades.find(assignmentId, actor.id),
        submissionCount: null,
        gradedCount: null,
      };
    }

    return {
      assignment,
      class: classObj,
      submission: null,
      grade: null,
      submissionCount: stores.submissions.findByAssignment(assignmentId).length,
      gradedCount: stores.grades.findByAssignment(assignmentId).length,
    };
  }
}
