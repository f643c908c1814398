/**
 * Grade Domain Model
 *
 * The organizer's result for one participant on one assignment.
 * Keyed uniquely by (assignmentId, participantId); grading again updates
 * the same record.
 */

export interface Grade {
  id: string;
  assignmentId: string;
  participantId: string;
  organizerId: string; // Who graded it
  score: number;
  feedback: string;
  rating?: number; // Optional 1-5 star rating
  gradedAt: string; // First grading
  updatedAt: string; // Latest grading
}

export interface GradeFields {
  organizerId: string;
  score: number;
  feedback: string;
  rating?: number | null; // Omitted keeps the stored rating, null clears it
}

/**
 * A grade joined with what a participant needs to read it
 */
export interface GradeView {
  gradeId: string;
  classId: string;
  className: string;
  assignmentId: string;
  assignmentTitle: string;
  score: number;
  feedback: string;
  rating?: number;
  gradedAt: string;
  updatedAt: string;
}

export const MIN_RATING = 1;
export const MAX_RATING = 5;
