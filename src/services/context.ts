/**
 * Service Context
 *
 * Everything a service needs, handed in explicitly by whoever builds the
 * services (the API app factory, a script, or a test).
 */

import { Stores } from "../stores";
import { ArtifactStorage } from "../storage/artifactStorage";
import { PolicyContext } from "../domain/policy";
import { NotFoundError, ValidationError } from "../domain/errors";
import { Class } from "../domain/class";
import { Assignment } from "../domain/assignment";
import { User } from "../domain/user";

export interface ServiceContext {
  stores: Stores;
  storage: ArtifactStorage;
  allowSelfEnrollment: boolean;
  maxUploadBytes: number;
  now: () => Date;
}

export function policyContext(ctx: ServiceContext): PolicyContext {
  return {
    isEnrolled: (classId, participantId) =>
      ctx.stores.enrollments.find(classId, participantId) !== null,
    allowSelfEnrollment: ctx.allowSelfEnrollment,
  };
}

export function requireClass(ctx: ServiceContext, classId: string): Class {
  const classObj = ctx.stores.classes.load(classId);
  if (!classObj) {
    throw new NotFoundError("Class", classId);
  }
  return classObj;
}

/**
 * Load an assignment together with the class it belongs to
 */
export function requireAssignment(
  ctx: ServiceContext,
  assignmentId: string
): { assignment: Assignment; classObj: Class } {
  const assignment = ctx.stores.assignments.load(assignmentId);
  if (!assignment) {
    throw new NotFoundError("Assignment", assignmentId);
  }
  return { assignment, classObj: requireClass(ctx, assignment.classId) };
}

export function requireParticipant(ctx: ServiceContext, userId: string): User {
  const user = ctx.stores.users.load(userId);
  if (!user || user.role !== "participant") {
    throw new NotFoundError("Participant", userId);
  }
  return user;
}

// ============================================
// Input validation
// ============================================

interface TextRule {
  min?: number;
  max?: number;
}

/**
 * Trimmed non-empty string, within the given length bounds
 */
export function requireText(value: unknown, field: string, rule: TextRule = {}): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ValidationError(`${field} is required`);
  }

  const text = value.trim();
  if (rule.min !== undefined && text.length < rule.min) {
    throw new ValidationError(`${field} must be at least ${rule.min} characters`);
  }
  if (rule.max !== undefined && text.length > rule.max) {
    throw new ValidationError(`${field} must be at most ${rule.max} characters`);
  }
  return text;
}

/**
 * Optional string; absent becomes "", anything that is not a string is rejected
 */
export function optionalText(value: unknown, field: string, max?: number): string {
  if (value === undefined || value === null) {
    return "";
  }
  if (typeof value !== "string") {
    throw new ValidationError(`${field} must be text`);
  }
  const text = value.trim();
  if (max !== undefined && text.length > max) {
    throw new ValidationError(`${field} must be at most ${max} characters`);
  }
  return text;
}
