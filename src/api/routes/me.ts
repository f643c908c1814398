/**
 * Current-user API Routes
 *
 * GET /api/dashboard, GET /api/grades/mine and notifications.
 */

import { Router } from "express";
import { ApiDeps } from "../deps";
import { sendError } from "../respond";
import { currentUser, requireUser } from "../sessions";

export function createDashboardRouter({ stores, services, sessions }: ApiDeps): Router {
  const router = Router();
  router.use(requireUser(sessions, stores));

  router.get("/", (req, res) => {
    try {
      res.json(services.dashboard.forUser(currentUser(req)));
    } catch (error) {
      sendError(res, error, "Failed to fetch dashboard");
    }
  });

  return router;
}

export function createGradesRouter({ stores, services, sessions }: ApiDeps): Router {
  const router = Router();
  router.use(requireUser(sessions, stores));

  /**
   * GET /api/grades/mine
   * The participant's grades across the classes they are enrolled in
   */
  router.get("/mine", (req, res) => {
    try {
      res.json(services.grades.listOwn(currentUser(req)));
    } catch (error) {
      sendError(res, error, "Failed to fetch grades");
    }
  });

  return router;
}

export function createNotificationsRouter({ stores, services, sessions }: ApiDeps): Router {
  const router = Router();
  router.use(requireUser(sessions, stores));

  /**
   * GET /api/notifications
   * Newest first; marks them read
   */
  router.get("/", (req, res) => {
    try {
      res.json(services.notifications.listForUser(currentUser(req)));
    } catch (error) {
      sendError(res, error, "Failed to fetch notifications");
    }
  });

  router.get("/unread-count", (req, res) => {
    try {
      res.json({ unreadCount: services.notifications.unreadCount(currentUser(req)) });
    } catch (error) {
      sendError(res, error, "Failed to count notifications");
    }
  });

  return router;
}
