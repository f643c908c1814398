/**
 * Assignment Domain Model
 *
 * A task set inside one class. Only the class's organizer creates or edits
 * assignments. Deleting an assignment deletes its submissions and grades.
 */

export type AssignmentCategory = "homework" | "test" | "project" | "quiz" | "exam";

export const ASSIGNMENT_CATEGORIES: readonly AssignmentCategory[] = [
  "homework",
  "test",
  "project",
  "quiz",
  "exam",
];

export function isAssignmentCategory(value: unknown): value is AssignmentCategory {
  return (
    typeof value === "string" &&
    ASSIGNMENT_CATEGORIES.some((category) => category === value)
  );
}

export interface Assignment {
  id: string;
  classId: string;
  organizerId: string; // Organizer who created it (the class owner)
  title: string;
  description: string;
  category: AssignmentCategory;
  dueAt: string | null; // ISO timestamp; past dates are allowed
  createdAt: string;
  updatedAt?: string;
}

export interface CreateAssignmentInput {
  classId: string;
  organizerId: string;
  title: string;
  description: string;
  category: AssignmentCategory;
  dueAt: string | null;
}

export interface UpdateAssignmentInput {
  title?: string;
  description?: string;
  category?: AssignmentCategory;
  dueAt?: string | null;
}

/**
 * A submission is late when it arrives after the due instant.
 * Assignments without a due date are never late.
 */
export function isPastDue(assignment: Pick<Assignment, "dueAt">, at: Date): boolean {
  if (!assignment.dueAt) {
    return false;
  }
  return at.getTime() > new Date(assignment.dueAt).getTime();
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse a due date given as "YYYY-MM-DD" (midnight UTC) or a full ISO timestamp.
 * Returns null for an empty value and undefined when the value cannot be parsed.
 */
export function parseDueDate(value: unknown): string | null | undefined {
  if (value === undefined || value === null || value === "") {
    return null;
  }
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  const candidate = DATE_ONLY.test(trimmed) ? `${trimmed}T00:00:00.000Z` : trimmed;
  const parsed = new Date(candidate);
  if (Number.isNaN(parsed.getTime())) {
    return undefined;
  }

  // Reject rollovers such as 2025-02-30
  if (DATE_ONLY.test(trimmed) && parsed.toISOString().substring(0, 10) !== trimmed) {
    return undefined;
  }

  return parsed.toISOString();
}
