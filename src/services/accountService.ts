/**
 * Account Service
 *
 * Registration, login and profile updates. This is the interface the
 * session layer uses to turn credentials into a User.
 */

import { ServiceContext, requireText } from "./context";
import { hashPassword, verifyPassword } from "./passwords";
import { AuthenticationError, NotFoundError, ValidationError } from "../domain/errors";
import { isRole, Role, UpdateProfileInput, User } from "../domain/user";

export interface RegisterInput {
  username?: unknown;
  email?: unknown;
  password?: unknown;
  firstName?: unknown;
  lastName?: unknown;
  role?: unknown;
}

export interface ProfileInput {
  email?: unknown;
  firstName?: unknown;
  lastName?: unknown;
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

function requireEmail(value: unknown): string {
  const email = requireText(value, "Email", { max: 100 });
  if (!EMAIL_PATTERN.test(email)) {
    throw new ValidationError("Email is not a valid address");
  }
  return email;
}

function requireRole(value: unknown): Role {
  if (!isRole(value)) {
    throw new ValidationError('Role must be "organizer" or "participant"');
  }
  return value;
}

export class AccountService {
  constructor(private readonly ctx: ServiceContext) {}

  /**
   * Register a new user. The role chosen here is permanent.
   */
  register(input: RegisterInput): User {
    const username = requireText(input.username, "Username", { min: 4, max: 20 });
    const email = requireEmail(input.email);
    if (typeof input.password !== "string" || input.password.length < 6) {
      throw new ValidationError("Password must be at least 6 characters");
    }
    const firstName = requireText(input.firstName, "First name", { max: 100 });
    const lastName = requireText(input.lastName, "Last name", { max: 100 });
    const role = requireRole(input.role);

    const user = this.ctx.stores.users.create({
      username,
      email,
      passwordHash: hashPassword(input.password),
      role,
      firstName,
      lastName,
    });

    console.log(`[auth] Registered ${role} ${username}`);
    return user;
  }

  /**
   * Check credentials. Unknown user and wrong password give the same error.
   */
  authenticate(username: unknown, password: unknown): User {
    if (typeof username !== "string" || typeof password !== "string") {
      throw new AuthenticationError("Invalid username or password");
    }

    const user = this.ctx.stores.users.findByUsername(username.trim());
    if (!user || !verifyPassword(password, user.passwordHash)) {
      throw new AuthenticationError("Invalid username or password");
    }
    return user;
  }

  updateProfile(actor: User, input: ProfileInput): User {
    const changes: UpdateProfileInput = {};
    if (input.email !== undefined) {
      changes.email = requireEmail(input.email);
    }
    if (input.firstName !== undefined) {
      changes.firstName = requireText(input.firstName, "First name", { max: 100 });
    }
    if (input.lastName !== undefined) {
      changes.lastName = requireText(input.lastName, "Last name", { max: 100 });
    }

    const updated = this.ctx.stores.users.updateProfile(actor.id, changes);
    if (!updated) {
      throw new NotFoundError("User", actor.id);
    }
    return updated;
  }
}
