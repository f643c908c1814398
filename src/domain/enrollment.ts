/**
 * Enrollment Domain Model
 *
 * Join record between a participant and a class. A (class, participant) pair
 * is enrolled at most once. Removing the enrollment removes the participant's
 * view of the class, its assignments and their grades.
 */

export type EnrollmentSource = "organizer" | "self";

export interface Enrollment {
  id: string;
  classId: string;
  participantId: string;
  enrolledAt: string;
  enrolledBy: EnrollmentSource;
}

export interface CreateEnrollmentInput {
  classId: string;
  participantId: string;
  enrolledBy: EnrollmentSource;
}
