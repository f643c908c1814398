/**
 * Session Registry
 *
 * Opaque bearer tokens issued at login. Tokens live in memory only, so a
 * restart logs everyone out. The token maps to a user id; the user record is
 * reloaded on every request, never cached with the session.
 */

import { randomUUID } from "crypto";
import { NextFunction, Request, Response } from "express";
import { Stores } from "../stores";
import { AuthenticationError } from "../domain/errors";
import { User } from "../domain/user";
import { sendError } from "./respond";

declare global {
  namespace Express {
    interface Request {
      user?: User;
      sessionToken?: string;
    }
  }
}

interface SessionEntry {
  userId: string;
  expiresAt: number;
}

export class SessionRegistry {
  private sessions = new Map<string, SessionEntry>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  create(userId: string): string {
    this.sweepExpired();
    const token = randomUUID();
    this.sessions.set(token, { userId, expiresAt: this.now() + this.ttlMs });
    return token;
  }

  /**
   * The user id behind a token, or null if unknown or expired
   */
  resolve(token: string): string | null {
    const entry = this.sessions.get(token);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.now()) {
      this.sessions.delete(token);
      return null;
    }
    return entry.userId;
  }

  private sweepExpired(): void {
    const now = this.now();
    for (const [token, entry] of this.sessions) {
      if (entry.expiresAt <= now) {
        this.sessions.delete(token);
      }
    }
  }

  revoke(token: string): boolean {
    return this.sessions.delete(token);
  }

  get size(): number {
    return this.sessions.size;
  }
}

export function bearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header) {
    return null;
  }
  const [scheme, token] = header.split(" ");
  return scheme === "Bearer" && token ? token : null;
}

/**
 * Middleware: attach the logged-in user to req.user or answer 401
 */
export function requireUser(sessions: SessionRegistry, stores: Stores) {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    const userId = token ? sessions.resolve(token) : null;
    const user = userId ? stores.users.load(userId) : null;

    if (!token || !user) {
      sendError(res, new AuthenticationError("Please log in"));
      return;
    }

    req.user = user;
    req.sessionToken = token;
    next();
  };
}

/**
 * The user attached by requireUser
 */
export function currentUser(req: Request): User {
  if (!req.user) {
    throw new AuthenticationError("Please log in");
  }
  return req.user;
}
