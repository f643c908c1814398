/**
 * Submission Store
 *
 * Persists submissions in submissions.json, at most one per
 * (assignmentId, participantId). upsert() is the only write path.
 */

import { randomUUID } from "crypto";
import { JsonTable } from "./jsonTable";
import { Submission, SubmissionFields } from "../domain/submission";

export interface UpsertResult<T> {
  record: T;
  created: boolean;
  changed: boolean; // false when the stored record already matched
  previous: T | null;
}

export class SubmissionStore {
  private table: JsonTable<Submission>;

  constructor(dataDir: string) {
    this.table = new JsonTable<Submission>(dataDir, "submissions.json");
  }

  /**
   * Insert the submission, or replace the existing one for the same pair.
   * A resubmission without an artifact keeps the previous artifact.
   */
  upsert(
    assignmentId: string,
    participantId: string,
    fields: SubmissionFields
  ): UpsertResult<Submission> {
    const submissions = this.table.read();
    const index = submissions.findIndex(
      (s) => s.assignmentId === assignmentId && s.participantId === participantId
    );

    if (index === -1) {
      const submission: Submission = {
        id: randomUUID(),
        assignmentId,
        participantId,
        ...fields,
      };
      submissions.push(submission);
      this.table.write(submissions);
      return { record: submission, created: true, changed: true, previous: null };
    }

    const previous = submissions[index];
    const updated: Submission = {
      ...previous,
      text: fields.text,
      artifact: fields.artifact ?? previous.artifact,
      submittedAt: fields.submittedAt,
      isLate: fields.isLate,
    };
    submissions[index] = updated;
    this.table.write(submissions);
    return { record: updated, created: false, changed: true, previous };
  }

  find(assignmentId: string, participantId: string): Submission | null {
    return (
      this.table
        .read()
        .find((s) => s.assignmentId === assignmentId && s.participantId === participantId) ||
      null
    );
  }

  findByAssignment(assignmentId: string): Submission[] {
    return this.table.read().filter((s) => s.assignmentId === assignmentId);
  }

  findByParticipant(participantId: string): Submission[] {
    return this.table.read().filter((s) => s.participantId === participantId);
  }

  /**
   * Remove all submissions of the given assignments. Returns the removed records
   * so the caller can delete their artifacts.
   */
  deleteByAssignments(assignmentIds: string[]): Submission[] {
    const doomed = new Set(assignmentIds);
    const submissions = this.table.read();
    const removed = submissions.filter((s) => doomed.has(s.assignmentId));
    if (removed.length > 0) {
      this.table.write(submissions.filter((s) => !doomed.has(s.assignmentId)));
    }
    return removed;
  }

  /**
   * Every artifact reference still held by a submission
   */
  getAllArtifactReferences(): Set<string> {
    const refs = new Set<string>();
    for (const submission of this.table.read()) {
      if (submission.artifact) {
        refs.add(submission.artifact.reference);
      }
    }
    return refs;
  }
}
