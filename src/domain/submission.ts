/**
 * Submission Domain Model
 *
 * A participant's work for one assignment: free text, an uploaded artifact,
 * or both. There is at most one live submission per (assignment, participant);
 * resubmitting replaces it in place.
 */

/**
 * Reference to an uploaded file held by ArtifactStorage
 */
export interface ArtifactRef {
  reference: string; // Opaque, issued by the storage
  originalName: string;
  size: number; // Bytes
}

export interface Submission {
  id: string;
  assignmentId: string;
  participantId: string;
  text: string;
  artifact: ArtifactRef | null;
  submittedAt: string;
  isLate: boolean;
}

export interface SubmissionFields {
  text: string;
  artifact: ArtifactRef | null; // null keeps the previous artifact on resubmission
  submittedAt: string;
  isLate: boolean;
}
