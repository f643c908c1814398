/**
 * Artifact Storage
 *
 * Where uploaded submission files live. The services only see opaque
 * references; LocalArtifactStorage keeps files in one directory on disk.
 */

import fs from "fs";
import path from "path";

export interface ArtifactStorage {
  /**
   * Store the bytes under the given (already sanitized) name.
   * Returns the reference to record on the submission.
   */
  save(name: string, bytes: Buffer): Promise<string>;

  /**
   * Delete an artifact. Returns false if it did not exist.
   */
  remove(reference: string): Promise<boolean>;

  /**
   * References of every stored artifact
   */
  list(): Promise<string[]>;
}

const REFERENCE_PREFIX = "uploads/assignments/";

export class LocalArtifactStorage implements ArtifactStorage {
  constructor(private readonly uploadDir: string) {}

  private pathFor(reference: string): string {
    if (!reference.startsWith(REFERENCE_PREFIX)) {
      throw new Error(`Not a local artifact reference: ${reference}`);
    }
    const name = reference.substring(REFERENCE_PREFIX.length);
    if (name.length === 0 || name !== path.basename(name)) {
      throw new Error(`Not a local artifact reference: ${reference}`);
    }
    return path.join(this.uploadDir, name);
  }

  async save(name: string, bytes: Buffer): Promise<string> {
    await fs.promises.mkdir(this.uploadDir, { recursive: true });
    // "wx" fails instead of overwriting if the name is somehow taken
    await fs.promises.writeFile(path.join(this.uploadDir, name), bytes, { flag: "wx" });
    return `${REFERENCE_PREFIX}${name}`;
  }

  async remove(reference: string): Promise<boolean> {
    try {
      await fs.promises.unlink(this.pathFor(reference));
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }

  async list(): Promise<string[]> {
    try {
      const entries = await fs.promises.readdir(this.uploadDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile())
        .map((entry) => `${REFERENCE_PREFIX}${entry.name}`);
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
