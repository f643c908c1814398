/**
 * Class Service
 *
 * Create, rename, view and delete classes.
 * Deleting a class cascades to its assignments, their submissions and
 * grades, its enrollments, and the uploaded files of those submissions.
 */

import { ServiceContext, policyContext, requireClass, requireText } from "./context";
import { discardArtifacts } from "./artifactCleanup";
import { assertAllowed } from "../domain/policy";
import { Assignment } from "../domain/assignment";
import { Class, ClassSummary, UpdateClassInput } from "../domain/class";
import { EnrollmentSource } from "../domain/enrollment";
import { NotFoundError } from "../domain/errors";
import { PublicUser, toPublicUser, User } from "../domain/user";

export interface ClassInput {
  name?: unknown;
  subject?: unknown;
}

export interface RosterEntry {
  participant: PublicUser;
  enrolledAt: string;
  enrolledBy: EnrollmentSource;
}

export interface ClassDetail {
  class: Class;
  organizer: PublicUser | null;
  assignments: Assignment[];
  roster: RosterEntry[] | null; // Only for the owning organizer
}

export interface DeleteClassResult {
  classId: string;
  assignments: number;
  submissions: number;
  grades: number;
  enrollments: number;
  artifacts: number;
}

export class ClassService {
  constructor(private readonly ctx: ServiceContext) {}

  create(actor: User, input: ClassInput): Class {
    assertAllowed(actor, { kind: "class:create" }, policyContext(this.ctx));

    const name = requireText(input.name, "Class name", { max: 100 });
    const subject = requireText(input.subject, "Subject", { max: 100 });

    return this.ctx.stores.classes.create({ name, subject, organizerId: actor.id });
  }

  update(actor: User, classId: string, input: ClassInput): Class {
    const classObj = requireClass(this.ctx, classId);
    assertAllowed(actor, { kind: "class:manage", target: classObj }, policyContext(this.ctx));

    const changes: UpdateClassInput = {};
    if (input.name !== undefined) {
      changes.name = requireText(input.name, "Class name", { max: 100 });
    }
    if (input.subject !== undefined) {
      changes.subject = requireText(input.subject, "Subject", { max: 100 });
    }

    const updated = this.ctx.stores.classes.update(classId, changes);
    if (!updated) {
      throw new NotFoundError("Class", classId);
    }
    return updated;
  }

  async delete(actor: User, classId: string): Promise<DeleteClassResult> {
    const classObj = requireClass(this.ctx, classId);
    assertAllowed(actor, { kind: "class:manage", target: classObj }, policyContext(this.ctx));

    const { stores } = this.ctx;
    const assignmentIds = stores.assignments.deleteByClass(classId);
    const submissions = stores.submissions.deleteByAssignments(assignmentIds);
    const grades = stores.grades.deleteByAssignments(assignmentIds);
    const enrollments = stores.enrollments.deleteByClass(classId);
    stores.classes.delete(classId);

    const artifacts = await discardArtifacts(this.ctx.storage, submissions);
    console.log(
      `[classes] Deleted ${classObj.name} (${assignmentIds.length} assignments, ${enrollments} enrollments)`
    );

    return {
      classId,
      assignments: assignmentIds.length,
      submissions: submissions.length,
      grades,
      enrollments,
      artifacts,
    };
  }

  /**
   * A class with its assignments. The owner also gets the roster.
   */
  getDetail(actor: User, classId: string): ClassDetail {
    const classObj = requireClass(this.ctx, classId);
    const policy = policyContext(this.ctx);
    assertAllowed(actor, { kind: "class:view", target: classObj }, policy);

    const { stores } = this.ctx;
    const organizer = stores.users.load(classObj.organizerId);
    const isOwner = actor.id === classObj.organizerId;

    return {
      class: classObj,
      organizer: organizer ? toPublicUser(organizer) : null,
      assignments: stores.assignments.findByClass(classId),
      roster: isOwner ? this.roster(classId) : null,
    };
  }

  /**
   * Classes the user owns (organizer) or is enrolled in (participant)
   */
  listForUser(actor: User): ClassSummary[] {
    const { stores } = this.ctx;
    const classes =
      actor.role === "organizer"
        ? stores.classes.findByOrganizer(actor.id)
        : stores.classes.getByIds(
            stores.enrollments.findByParticipant(actor.id).map((e) => e.classId)
          );

    return classes.map((c) => this.summarize(c));
  }

  summarize(classObj: Class): ClassSummary {
    const { stores } = this.ctx;
    return {
      id: classObj.id,
      name: classObj.name,
      subject: classObj.subject,
      organizerId: classObj.organizerId,
      participantCount: stores.enrollments.findByClass(classObj.id).length,
      assignmentCount: stores.assignments.findByClass(classObj.id).length,
      createdAt: classObj.createdAt,
    };
  }

  private roster(classId: string): RosterEntry[] {
    const { stores } = this.ctx;
    const enrollments = stores.enrollments.findByClass(classId);
    const users = new Map(
      stores.users.getByIds(enrollments.map((e) => e.participantId)).map((u) => [u.id, u])
    );

    const roster: RosterEntry[] = [];
    for (const enrollment of enrollments) {
      const participant = users.get(enrollment.participantId);
      if (participant) {
        roster.push({
          participant: toPublicUser(participant),
          enrolledAt: enrollment.enrolledAt,
          enrolledBy: enrollment.enrolledBy,
        });
      }
    }
    return roster.sort((a, b) => a.participant.lastName.localeCompare(b.participant.lastName));
  }
}
