/**
 * User Domain Model
 *
 * A user registers once with a role that never changes afterwards.
 *
 * Relationships:
 * - Organizer owns Classes (via Class.organizerId)
 * - Participant belongs to Classes (via Enrollment)
 * - Participant has Submissions and Grades
 */

export type Role = "organizer" | "participant";

const ROLES: readonly Role[] = ["organizer", "participant"];

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLES.some((role) => role === value);
}

export interface User {
  id: string;
  username: string; // Unique, case-insensitive
  email: string; // Unique, case-insensitive
  passwordHash: string; // Never leaves the service layer
  readonly role: Role;
  firstName: string;
  lastName: string;
  createdAt: string;
}

/**
 * User as returned to clients
 */
export type PublicUser = Omit<User, "passwordHash">;

export interface CreateUserInput {
  username: string;
  email: string;
  passwordHash: string;
  role: Role;
  firstName: string;
  lastName: string;
}

/**
 * Profile fields a user may change. Role is deliberately absent.
 */
export interface UpdateProfileInput {
  email?: string;
  firstName?: string;
  lastName?: string;
}

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

export function displayName(user: Pick<User, "firstName" | "lastName" | "username">): string {
  const full = `${user.firstName} ${user.lastName}`.trim();
  return full.length > 0 ? full : user.username;
}
