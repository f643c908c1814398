import { ArtifactStorage } from "../storage/artifactStorage";
import { Submission } from "../domain/submission";

/**
 * Remove the artifacts of submissions that were just deleted.
 *
 * Runs after the records are gone; a file that fails to delete is only an
 * orphan, which pruneArtifacts picks up later, so failures are logged and
 * the remaining files are still attempted.
 */
export async function discardArtifacts(
  storage: ArtifactStorage,
  submissions: Submission[]
): Promise<number> {
  let removed = 0;
  for (const submission of submissions) {
    if (!submission.artifact) {
      continue;
    }
    try {
      if (await storage.remove(submission.artifact.reference)) {
        removed++;
      }
    } catch (error) {
      console.error(`[artifacts] Failed to remove ${submission.artifact.reference}:`, error);
    }
  }
  return removed;
}
