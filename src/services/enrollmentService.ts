/**
 * Enrollment Service
 *
 * Organizers enroll participants in the classes they own. When
 * ALLOW_SELF_ENROLLMENT is on, a participant may also join a class
 * themselves. Either side may end an enrollment.
 */

import { ServiceContext, policyContext, requireClass, requireParticipant } from "./context";
import { NotificationService } from "./notificationService";
import { assertAllowed } from "../domain/policy";
import { Enrollment } from "../domain/enrollment";
import { NotFoundError, ValidationError } from "../domain/errors";
import { User } from "../domain/user";

export interface EnrollInput {
  participantId?: unknown;
  username?: unknown;
}

export class EnrollmentService {
  private notifications: NotificationService;

  constructor(private readonly ctx: ServiceContext) {
    this.notifications = new NotificationService(ctx);
  }

  /**
   * Resolve the participant named by id or username
   */
  private resolveParticipantId(input: EnrollInput): string {
    if (typeof input.participantId === "string" && input.participantId.trim()) {
      return input.participantId.trim();
    }
    if (typeof input.username === "string" && input.username.trim()) {
      const user = this.ctx.stores.users.findByUsername(input.username.trim());
      if (!user) {
        throw new NotFoundError("Participant", input.username.trim());
      }
      return user.id;
    }
    throw new ValidationError("participantId or username is required");
  }

  /**
   * Enroll a participant. Throws ConflictError if they are already enrolled.
   */
  enroll(actor: User, classId: string, input: EnrollInput): Enrollment {
    const classObj = requireClass(this.ctx, classId);
    const participantId = this.resolveParticipantId(input);
    assertAllowed(
      actor,
      { kind: "enrollment:create", target: classObj, participantId },
      policyContext(this.ctx)
    );
    requireParticipant(this.ctx, participantId);

    const enrolledBy = actor.id === participantId ? "self" : "organizer";
    const enrollment = this.ctx.stores.enrollments.create({
      classId,
      participantId,
      enrolledBy,
    });

    if (enrolledBy === "organizer") {
      this.notifications.enrolled(classObj, participantId);
    }
    return enrollment;
  }

  /**
   * Self-service join for the acting participant
   */
  join(actor: User, classId: string): Enrollment {
    return this.enroll(actor, classId, { participantId: actor.id });
  }

  unenroll(actor: User, classId: string, participantId: string): void {
    const classObj = requireClass(this.ctx, classId);
    assertAllowed(
      actor,
      { kind: "enrollment:delete", target: classObj, participantId },
      policyContext(this.ctx)
    );

    if (!this.ctx.stores.enrollments.delete(classId, participantId)) {
      throw new NotFoundError("Enrollment", `${classId}/${participantId}`);
    }
  }
}
