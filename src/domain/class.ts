/**
 * Class Domain Model
 *
 * A named unit of instruction (a "program" in some schools) owned by exactly
 * one organizer.
 *
 * Relationships:
 * - Class belongs to an Organizer (via organizerId)
 * - Class has Participants (via Enrollment)
 * - Class has Assignments (via Assignment.classId)
 */

export interface Class {
  id: string;
  name: string;
  subject: string;
  organizerId: string; // Owner, fixed at creation
  createdAt: string;
  updatedAt?: string;
}

/**
 * Summary type for dashboards
 */
export interface ClassSummary {
  id: string;
  name: string;
  subject: string;
  organizerId: string;
  participantCount: number;
  assignmentCount: number;
  createdAt: string;
}

export interface CreateClassInput {
  name: string;
  subject: string;
  organizerId: string;
}

export interface UpdateClassInput {
  name?: string;
  subject?: string;
}
