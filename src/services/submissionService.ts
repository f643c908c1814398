/**
 * Submission Service
 *
 * Participants hand in work for assignments in classes they are enrolled in.
 * The uploaded file is written first and the submission record committed
 * second, so a record never points at a file that was not stored.
 */

import { ServiceContext, optionalText, policyContext, requireAssignment } from "./context";
import { NotificationService } from "./notificationService";
import { UpsertResult } from "../stores";
import { assertAllowed } from "../domain/policy";
import { Assignment, isPastDue } from "../domain/assignment";
import { Class } from "../domain/class";
import {
  ALLOWED_EXTENSIONS,
  buildArtifactName,
  isAllowedExtension,
} from "../domain/artifact";
import { ValidationError } from "../domain/errors";
import { Grade } from "../domain/grade";
import { ArtifactRef, Submission } from "../domain/submission";
import { PublicUser, toPublicUser, User } from "../domain/user";

export interface UploadedFile {
  originalName: string;
  bytes: Buffer;
}

export interface SubmitInput {
  text?: unknown;
  file?: UploadedFile | null;
}

/**
 * One row of the organizer's submissions view: every enrolled participant,
 * with or without a submission
 */
export interface SubmissionRow {
  participant: PublicUser;
  submission: Submission | null;
  grade: Grade | null;
}

export class SubmissionService {
  private notifications: NotificationService;

  constructor(private readonly ctx: ServiceContext) {
    this.notifications = new NotificationService(ctx);
  }

  private checkFile(file: UploadedFile): void {
    if (!isAllowedExtension(file.originalName)) {
      throw new ValidationError(`Allowed file types: ${ALLOWED_EXTENSIONS.join(", ")}`);
    }
    if (file.bytes.length === 0) {
      throw new ValidationError("Uploaded file is empty");
    }
    if (file.bytes.length > this.ctx.maxUploadBytes) {
      throw new ValidationError(`File is larger than ${this.ctx.maxUploadBytes} bytes`);
    }
  }

  private requireSubmittable(
    actor: User,
    assignmentId: string
  ): { assignment: Assignment; classObj: Class } {
    const found = requireAssignment(this.ctx, assignmentId);
    assertAllowed(
      actor,
      { kind: "submission:create", target: found.classObj, participantId: actor.id },
      policyContext(this.ctx)
    );
    return found;
  }

  /**
   * Submit (or resubmit) the acting participant's work
   */
  async submit(actor: User, assignmentId: string, input: SubmitInput): Promise<Submission> {
    const { assignment, classObj } = this.requireSubmittable(actor, assignmentId);

    const text = optionalText(input.text, "Submission text", 20000);
    const file = input.file ?? null;
    if (!file && text.length === 0) {
      throw new ValidationError("Submit some text, a file, or both");
    }
    if (file) {
      this.checkFile(file);
    }

    const now = this.ctx.now();
    let artifact: ArtifactRef | null = null;
    if (file) {
      const name = buildArtifactName(file.originalName, now);
      const reference = await this.ctx.storage.save(name, file.bytes);
      artifact = { reference, originalName: file.originalName, size: file.bytes.length };
    }

    let result: UpsertResult<Submission>;
    try {
      // Re-checked in the same tick as the upsert; the save above yields
      const current = this.requireSubmittable(actor, assignmentId);
      result = this.ctx.stores.submissions.upsert(assignmentId, actor.id, {
        text,
        artifact,
        submittedAt: now.toISOString(),
        isLate: isPastDue(current.assignment, now),
      });
    } catch (error) {
      if (artifact) {
        await this.ctx.storage.remove(artifact.reference);
      }
      throw error;
    }

    // A new file replaces the old one; the old file is no longer referenced
    const replaced = result.previous?.artifact;
    if (artifact && replaced && replaced.reference !== artifact.reference) {
      await this.ctx.storage.remove(replaced.reference);
    }

    this.notifications.submissionReceived(assignment, classObj, actor);
    return result.record;
  }

  /**
   * Every enrolled participant with their submission and grade, for the owner
   */
  listForAssignment(actor: User, assignmentId: string): SubmissionRow[] {
    const { classObj } = requireAssignment(this.ctx, assignmentId);
    assertAllowed(actor, { kind: "grade:view-class", target: classObj }, policyContext(this.ctx));

    const { stores } = this.ctx;
    const enrollments = stores.enrollments.findByClass(classObj.id);
    const participants = stores.users.getByIds(enrollments.map((e) => e.participantId));
    const submissions = new Map(
      stores.submissions.findByAssignment(assignmentId).map((s) => [s.participantId, s])
    );
    const grades = new Map(
      stores.grades.findByAssignment(assignmentId).map((g) => [g.participantId, g])
    );

    return participants
      .map((participant) => ({
        participant: toPublicUser(participant),
        submission: submissions.get(participant.id) ?? null,
        grade: grades.get(participant.id) ?? null,
      }))
      .sort((a, b) => a.participant.lastName.localeCompare(b.participant.lastName));
  }
}
