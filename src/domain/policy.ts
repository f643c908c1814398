/**
 * Authorization Policy
 *
 * One place that decides whether a user may perform an action on a target.
 * Every service calls assertAllowed() before touching the stores, so there
 * are no role checks scattered through the routes.
 *
 * Ownership is per class, not per role: an organizer may only manage the
 * classes they own, and a participant only sees classes they are enrolled in.
 * Enrollment is looked up through the context on every call, never cached.
 */

import { Class } from "./class";
import { Grade } from "./grade";
import { User } from "./user";
import { AuthorizationError } from "./errors";

export type Action =
  | { kind: "class:create" }
  | { kind: "class:manage"; target: Class }
  | { kind: "class:view"; target: Class }
  | { kind: "assignment:create"; target: Class }
  | { kind: "assignment:modify"; target: Class }
  | { kind: "assignment:view"; target: Class }
  | { kind: "enrollment:create"; target: Class; participantId: string }
  | { kind: "enrollment:delete"; target: Class; participantId: string }
  | { kind: "submission:create"; target: Class; participantId: string }
  | { kind: "grade:write"; target: Class }
  | { kind: "grade:list-own" }
  | { kind: "grade:view-own"; target: Grade }
  | { kind: "grade:view-class"; target: Class };

export type Decision = { allowed: true } | { allowed: false; reason: string };

export interface PolicyContext {
  isEnrolled(classId: string, participantId: string): boolean;
  allowSelfEnrollment: boolean;
}

const ALLOW: Decision = { allowed: true };

function deny(reason: string): Decision {
  return { allowed: false, reason };
}

function ownsClass(actor: User, target: Class): boolean {
  return actor.role === "organizer" && target.organizerId === actor.id;
}

function ownerOnly(actor: User, target: Class, what: string): Decision {
  return ownsClass(actor, target)
    ? ALLOW
    : deny(`Only the organizer of this class can ${what}`);
}

function ownerOrEnrolled(actor: User, target: Class, ctx: PolicyContext): Decision {
  if (ownsClass(actor, target)) {
    return ALLOW;
  }
  if (actor.role === "participant" && ctx.isEnrolled(target.id, actor.id)) {
    return ALLOW;
  }
  return deny("You are not a member of this class");
}

export function authorize(actor: User, action: Action, ctx: PolicyContext): Decision {
  switch (action.kind) {
    case "class:create":
      return actor.role === "organizer"
        ? ALLOW
        : deny("Only organizers can create classes");

    case "class:manage":
      return ownerOnly(actor, action.target, "manage it");

    case "class:view":
    case "assignment:view":
      return ownerOrEnrolled(actor, action.target, ctx);

    case "assignment:create":
    case "assignment:modify":
      return ownerOnly(actor, action.target, "create or change its assignments");

    case "enrollment:create":
      if (ownsClass(actor, action.target)) {
        return ALLOW;
      }
      if (
        ctx.allowSelfEnrollment &&
        actor.role === "participant" &&
        actor.id === action.participantId
      ) {
        return ALLOW;
      }
      return deny("Only the organizer of this class can enroll participants");

    case "enrollment:delete":
      if (ownsClass(actor, action.target)) {
        return ALLOW;
      }
      if (actor.role === "participant" && actor.id === action.participantId) {
        return ALLOW;
      }
      return deny("Only the organizer of this class can remove participants");

    case "submission:create":
      if (actor.role !== "participant") {
        return deny("Only participants can submit work");
      }
      if (actor.id !== action.participantId) {
        return deny("You can only submit your own work");
      }
      return ctx.isEnrolled(action.target.id, actor.id)
        ? ALLOW
        : deny("You are not enrolled in this class");

    case "grade:write":
      return ownerOnly(actor, action.target, "grade its assignments");

    case "grade:list-own":
      return actor.role === "participant"
        ? ALLOW
        : deny("Only participants have grades of their own");

    case "grade:view-own":
      return actor.role === "participant" && action.target.participantId === actor.id
        ? ALLOW
        : deny("You can only view your own grades");

    case "grade:view-class":
      return ownerOnly(actor, action.target, "view all of its grades");
  }
}

/**
 * Throws AuthorizationError when the action is denied
 */
export function assertAllowed(actor: User, action: Action, ctx: PolicyContext): void {
  const decision = authorize(actor, action, ctx);
  if (!decision.allowed) {
    throw new AuthorizationError(decision.reason);
  }
}
