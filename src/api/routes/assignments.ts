/**
 * Assignments API Routes
 *
 * Reading and editing an assignment, handing in work, and grading it.
 */

import { Router } from "express";
import { ApiDeps } from "../deps";
import { sendError } from "../respond";
import { currentUser, requireUser } from "../sessions";
import { readUpload } from "../uploads";

export function createAssignmentsRouter({ stores, services, sessions }: ApiDeps): Router {
  const router = Router();
  router.use(requireUser(sessions, stores));

  /**
   * GET /api/assignments/:id
   * Participants also get their own submission and grade
   */
  router.get("/:id", (req, res) => {
    try {
      res.json(services.assignments.getDetail(currentUser(req), req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to fetch assignment");
    }
  });

  /**
   * PUT /api/assignments/:id
   */
  router.put("/:id", (req, res) => {
    try {
      const { title, description, category, dueDate } = req.body ?? {};
      const updated = services.assignments.update(currentUser(req), req.params.id, {
        title,
        description,
        category,
        dueDate,
      });
      res.json(updated);
    } catch (error) {
      sendError(res, error, "Failed to update assignment");
    }
  });

  /**
   * DELETE /api/assignments/:id
   */
  router.delete("/:id", async (req, res) => {
    try {
      res.json(await services.assignments.delete(currentUser(req), req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to delete assignment");
    }
  });

  /**
   * POST /api/assignments/:id/submission
   * Body: { text?, file?: { name, contentBase64 } }
   */
  router.post("/:id/submission", async (req, res) => {
    try {
      const { text, file } = req.body ?? {};
      const submission = await services.submissions.submit(currentUser(req), req.params.id, {
        text,
        file: readUpload(file),
      });
      res.status(201).json(submission);
    } catch (error) {
      sendError(res, error, "Failed to submit assignment");
    }
  });

  /**
   * GET /api/assignments/:id/submissions
   * Every enrolled participant with submission and grade, for the organizer
   */
  router.get("/:id/submissions", (req, res) => {
    try {
      res.json(services.submissions.listForAssignment(currentUser(req), req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to fetch submissions");
    }
  });

  /**
   * PUT /api/assignments/:id/grades/:participantId
   * Body: { score, feedback?, rating? } (rating: null clears it)
   */
  router.put("/:id/grades/:participantId", (req, res) => {
    try {
      const { score, feedback, rating } = req.body ?? {};
      const grade = services.grades.grade(
        currentUser(req),
        req.params.id,
        req.params.participantId,
        { score, feedback, rating }
      );
      res.json(grade);
    } catch (error) {
      sendError(res, error, "Failed to save grade");
    }
  });

  /**
   * PUT /api/assignments/:id/grades
   * Body: { grades: [{ participantId, score, feedback?, rating? }] }
   */
  router.put("/:id/grades", (req, res) => {
    try {
      const grades = services.grades.gradeMany(currentUser(req), req.params.id, req.body?.grades);
      res.json(grades);
    } catch (error) {
      sendError(res, error, "Failed to save grades");
    }
  });

  return router;
}
