import { createTestEnv, registerUser, TestEnv } from "./testContext";
import { AuthorizationError, ValidationError } from "../domain/errors";
import { Assignment } from "../domain/assignment";
import { Class } from "../domain/class";
import { User } from "../domain/user";

describe("GradeService", () => {
  let env: TestEnv;
  let organizer: User;
  let otherOrganizer: User;
  let participant: User;
  let outsider: User;
  let algebra: Class;
  let hw1: Assignment;

  const gradeNotifications = (userId: string) =>
    env.ctx.stores.notifications.findByUser(userId).filter((n) => n.type === "grade");

  beforeEach(() => {
    env = createTestEnv();
    organizer = registerUser(env.services, "organizer", "organizer");
    otherOrganizer = registerUser(env.services, "organizer2", "organizer");
    participant = registerUser(env.services, "participant", "participant");
    outsider = registerUser(env.services, "outsider", "participant");
    algebra = env.services.classes.create(organizer, { name: "Algebra", subject: "Math" });
    env.services.enrollments.enroll(organizer, algebra.id, { participantId: participant.id });
    hw1 = env.services.assignments.create(organizer, algebra.id, { title: "HW1" });
  });

  afterEach(() => env.cleanup());

  describe("grade", () => {
    it("keeps a single grade per participant and assignment", () => {
      const first = env.services.grades.grade(organizer, hw1.id, participant.id, {
        score: 85,
        feedback: "good work",
      });
      const second = env.services.grades.grade(organizer, hw1.id, participant.id, {
        score: 90,
        feedback: "revised",
      });

      expect(second.id).toBe(first.id);
      expect(env.ctx.stores.grades.findByAssignment(hw1.id)).toEqual([
        expect.objectContaining({ score: 90, feedback: "revised", organizerId: organizer.id }),
      ]);
      expect(gradeNotifications(participant.id).map((n) => n.message)).toEqual([
        'Your grade for "HW1" is now 90',
        'Your grade for "HW1" is now 85',
      ]);
    });

    it("does not notify again when the grade is unchanged", () => {
      env.services.grades.grade(organizer, hw1.id, participant.id, { score: 85, feedback: "ok" });
      env.services.grades.grade(organizer, hw1.id, participant.id, { score: 85, feedback: "ok" });

      expect(gradeNotifications(participant.id)).toHaveLength(1);
    });

    it("accepts a numeric string score and an optional rating", () => {
      const grade = env.services.grades.grade(organizer, hw1.id, participant.id, {
        score: "88.5",
        rating: 4,
      });

      expect(grade.score).toBe(88.5);
      expect(grade.rating).toBe(4);
      expect(grade.feedback).toBe("");
    });

    it("keeps the rating when it is left out and clears it on null", () => {
      env.services.grades.grade(organizer, hw1.id, participant.id, { score: 80, rating: 4 });

      const kept = env.services.grades.grade(organizer, hw1.id, participant.id, { score: 82 });
      expect(kept.rating).toBe(4);

      const cleared = env.services.grades.grade(organizer, hw1.id, participant.id, {
        score: 82,
        rating: null,
      });
      expect(cleared.rating).toBeUndefined();
      expect(env.ctx.stores.grades.find(hw1.id, participant.id)).not.toHaveProperty("rating");
    });

    it.each([
      [{ score: "abc" }, "Score must be a number"],
      [{}, "Score must be a number"],
      [{ score: 70, rating: 6 }, "Rating must be a whole number from 1 to 5"],
      [{ score: 70, rating: 2.5 }, "Rating must be a whole number from 1 to 5"],
    ])("rejects %o", (input, message) => {
      expect(() => env.services.grades.grade(organizer, hw1.id, participant.id, input)).toThrow(
        new ValidationError(message)
      );
    });

    it("refuses to grade a participant who is not enrolled", () => {
      expect(() => env.services.grades.grade(organizer, hw1.id, outsider.id, { score: 50 })).toThrow(
        new AuthorizationError("Participant is not enrolled in this class")
      );
      expect(env.ctx.stores.grades.findByParticipant(outsider.id)).toEqual([]);
    });

    it("is denied to organizers who do not own the class", () => {
      expect(() =>
        env.services.grades.grade(otherOrganizer, hw1.id, participant.id, { score: 50 })
      ).toThrow(new AuthorizationError("Only the organizer of this class can grade its assignments"));
    });

    it("is denied to participants", () => {
      expect(() =>
        env.services.grades.grade(participant, hw1.id, participant.id, { score: 100 })
      ).toThrow(AuthorizationError);
    });
  });

  describe("gradeMany", () => {
    it("grades several participants at once", () => {
      const second = registerUser(env.services, "second", "participant");
      env.services.enrollments.enroll(organizer, algebra.id, { participantId: second.id });

      const grades = env.services.grades.gradeMany(organizer, hw1.id, [
        { participantId: participant.id, score: 80 },
        { participantId: second.id, score: 95, feedback: "excellent" },
      ]);

      expect(grades.map((g) => g.score)).toEqual([80, 95]);
      expect(env.ctx.stores.grades.findByAssignment(hw1.id)).toHaveLength(2);
    });

    it("writes nothing when one entry is invalid", () => {
      expect(() =>
        env.services.grades.gradeMany(organizer, hw1.id, [
          { participantId: participant.id, score: 80 },
          { participantId: outsider.id, score: 60 },
        ])
      ).toThrow(AuthorizationError);
      expect(env.ctx.stores.grades.findByAssignment(hw1.id)).toEqual([]);
    });

    it("rejects duplicate participants", () => {
      expect(() =>
        env.services.grades.gradeMany(organizer, hw1.id, [
          { participantId: participant.id, score: 80 },
          { participantId: participant.id, score: 90 },
        ])
      ).toThrow(new ValidationError(`Duplicate grade for participant ${participant.id}`));
    });

    it("rejects an empty list", () => {
      expect(() => env.services.grades.gradeMany(organizer, hw1.id, [])).toThrow(
        new ValidationError("grades must be a non-empty array")
      );
    });
  });

  describe("listOwn", () => {
    it("returns the participant's grades with class and assignment names", () => {
      env.services.grades.grade(organizer, hw1.id, participant.id, { score: 85, rating: 5 });

      const grades = env.services.grades.listOwn(participant);

      expect(grades).toEqual([
        expect.objectContaining({
          classId: algebra.id,
          className: "Algebra",
          assignmentId: hw1.id,
          assignmentTitle: "HW1",
          score: 85,
          feedback: "",
          rating: 5,
        }),
      ]);
    });

    it("hides grades from classes the participant has left", () => {
      env.services.grades.grade(organizer, hw1.id, participant.id, { score: 85 });
      env.services.enrollments.unenroll(organizer, algebra.id, participant.id);

      expect(env.services.grades.listOwn(participant)).toEqual([]);
    });

    it("does not show other participants' grades", () => {
      const second = registerUser(env.services, "second", "participant");
      env.services.enrollments.enroll(organizer, algebra.id, { participantId: second.id });
      env.services.grades.grade(organizer, hw1.id, second.id, { score: 40 });

      expect(env.services.grades.listOwn(participant)).toEqual([]);
    });

    it("is denied to organizers", () => {
      expect(() => env.services.grades.listOwn(organizer)).toThrow(
        new AuthorizationError("Only participants have grades of their own")
      );
    });
  });

  describe("gradeSheet", () => {
    it("has a row per participant and a column per assignment", () => {
      const quiz = env.services.assignments.create(organizer, algebra.id, {
        title: "Quiz 1",
        category: "quiz",
        dueDate: "2025-03-01",
      });
      env.services.grades.grade(organizer, quiz.id, participant.id, { score: 7 });

      const sheet = env.services.grades.gradeSheet(organizer, algebra.id);

      expect(sheet.assignments.map((a) => a.title)).toEqual(["Quiz 1", "HW1"]);
      expect(sheet.rows).toHaveLength(1);
      expect(sheet.rows[0].participant.username).toBe("participant");
      expect(sheet.rows[0].grades.map((g) => g?.score ?? null)).toEqual([7, null]);
    });

    it("is denied to enrolled participants", () => {
      expect(() => env.services.grades.gradeSheet(participant, algebra.id)).toThrow(AuthorizationError);
    });
  });
});
