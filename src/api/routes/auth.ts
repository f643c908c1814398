/**
 * Auth API Routes
 *
 * Registration, login and the current user's profile.
 * Login returns a bearer token for the Authorization header.
 */

import { Router } from "express";
import { ApiDeps } from "../deps";
import { sendError } from "../respond";
import { currentUser, requireUser } from "../sessions";
import { toPublicUser } from "../../domain/user";

export function createAuthRouter({ stores, services, sessions }: ApiDeps): Router {
  const router = Router();

  /**
   * POST /api/auth/register
   * Create an account. Role is "organizer" or "participant" and cannot change later.
   */
  router.post("/register", (req, res) => {
    try {
      const user = services.accounts.register(req.body ?? {});
      res.status(201).json(toPublicUser(user));
    } catch (error) {
      sendError(res, error, "Failed to register");
    }
  });

  /**
   * POST /api/auth/login
   */
  router.post("/login", (req, res) => {
    try {
      const { username, password } = req.body ?? {};
      const user = services.accounts.authenticate(username, password);
      const token = sessions.create(user.id);
      console.log(`[auth] ${user.username} logged in`);
      res.json({ token, user: toPublicUser(user) });
    } catch (error) {
      sendError(res, error, "Failed to log in");
    }
  });

  router.use(requireUser(sessions, stores));

  /**
   * POST /api/auth/logout
   */
  router.post("/logout", (req, res) => {
    if (req.sessionToken) {
      sessions.revoke(req.sessionToken);
    }
    res.json({ success: true });
  });

  /**
   * GET /api/auth/me
   */
  router.get("/me", (req, res) => {
    try {
      res.json(toPublicUser(currentUser(req)));
    } catch (error) {
      sendError(res, error, "Failed to fetch user");
    }
  });

  /**
   * PUT /api/auth/me
   * Update name or email. Role is not editable.
   */
  router.put("/me", (req, res) => {
    try {
      const updated = services.accounts.updateProfile(currentUser(req), req.body ?? {});
      res.json(toPublicUser(updated));
    } catch (error) {
      sendError(res, error, "Failed to update profile");
    }
  });

  return router;
}
