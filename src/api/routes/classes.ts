/**
 * Classes API Routes
 *
 * Classes, their enrollments, their assignments and the grade sheet.
 * Who may do what is decided in the services; routes only translate.
 */

import { Router } from "express";
import { ApiDeps } from "../deps";
import { sendError } from "../respond";
import { currentUser, requireUser } from "../sessions";

export function createClassesRouter({ stores, services, sessions }: ApiDeps): Router {
  const router = Router();
  router.use(requireUser(sessions, stores));

  // ============================================
  // Class CRUD
  // ============================================

  /**
   * GET /api/classes
   * Classes the user owns or is enrolled in
   */
  router.get("/", (req, res) => {
    try {
      res.json(services.classes.listForUser(currentUser(req)));
    } catch (error) {
      sendError(res, error, "Failed to fetch classes");
    }
  });

  /**
   * POST /api/classes
   */
  router.post("/", (req, res) => {
    try {
      const { name, subject } = req.body ?? {};
      const classObj = services.classes.create(currentUser(req), { name, subject });
      res.status(201).json(classObj);
    } catch (error) {
      sendError(res, error, "Failed to create class");
    }
  });

  /**
   * GET /api/classes/:id
   * Class with assignments (and roster for its organizer)
   */
  router.get("/:id", (req, res) => {
    try {
      res.json(services.classes.getDetail(currentUser(req), req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to fetch class");
    }
  });

  /**
   * PUT /api/classes/:id
   */
  router.put("/:id", (req, res) => {
    try {
      const { name, subject } = req.body ?? {};
      res.json(services.classes.update(currentUser(req), req.params.id, { name, subject }));
    } catch (error) {
      sendError(res, error, "Failed to update class");
    }
  });

  /**
   * DELETE /api/classes/:id
   * Deletes the class with its assignments, submissions, grades and enrollments
   */
  router.delete("/:id", async (req, res) => {
    try {
      res.json(await services.classes.delete(currentUser(req), req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to delete class");
    }
  });

  /**
   * GET /api/classes/:id/grades
   * Grade sheet for the organizer
   */
  router.get("/:id/grades", (req, res) => {
    try {
      res.json(services.grades.gradeSheet(currentUser(req), req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to fetch grades");
    }
  });

  // ============================================
  // Enrollment
  // ============================================

  /**
   * POST /api/classes/:id/enrollments
   * Body: { participantId } or { username }
   */
  router.post("/:id/enrollments", (req, res) => {
    try {
      const { participantId, username } = req.body ?? {};
      const enrollment = services.enrollments.enroll(currentUser(req), req.params.id, {
        participantId,
        username,
      });
      res.status(201).json(enrollment);
    } catch (error) {
      sendError(res, error, "Failed to enroll participant");
    }
  });

  /**
   * POST /api/classes/:id/join
   * Self-enrollment, when enabled
   */
  router.post("/:id/join", (req, res) => {
    try {
      res.status(201).json(services.enrollments.join(currentUser(req), req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to join class");
    }
  });

  /**
   * DELETE /api/classes/:id/enrollments/:participantId
   */
  router.delete("/:id/enrollments/:participantId", (req, res) => {
    try {
      services.enrollments.unenroll(currentUser(req), req.params.id, req.params.participantId);
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, "Failed to remove participant");
    }
  });

  // ============================================
  // Assignments
  // ============================================

  /**
   * POST /api/classes/:id/assignments
   * Body: { title, description?, category?, dueDate? }
   */
  router.post("/:id/assignments", (req, res) => {
    try {
      const { title, description, category, dueDate } = req.body ?? {};
      const assignment = services.assignments.create(currentUser(req), req.params.id, {
        title,
        description,
        category,
        dueDate,
      });
      res.status(201).json(assignment);
    } catch (error) {
      sendError(res, error, "Failed to create assignment");
    }
  });

  return router;
}
