/**
 * Artifact naming and upload rules
 *
 * Uploaded files are stored under a name derived from the upload time plus a
 * random suffix, so two uploads of "hw1.pdf" never overwrite each other.
 */

import { randomBytes } from "crypto";
import path from "path";

export const ALLOWED_EXTENSIONS: readonly string[] = [
  "pdf",
  "doc",
  "docx",
  "txt",
  "jpg",
  "png",
  "zip",
];

const MAX_NAME_LENGTH = 100;

/**
 * Reduce a client-supplied file name to a safe basename.
 * Drops any directory part and accents, replaces everything outside
 * [A-Za-z0-9._-] with "_" and strips leading dots. Long names are cut
 * before the extension.
 */
export function sanitizeFileName(name: string): string {
  const base = name.split(/[\\/]/).pop() ?? "";
  const safe = base
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^A-Za-z0-9._-]+/g, "_")
    .replace(/^[._]+/, "")
    .replace(/_+/g, "_");
  if (safe.length <= MAX_NAME_LENGTH) {
    return safe;
  }

  const ext = path.extname(safe);
  if (ext.length === 0 || ext.length >= MAX_NAME_LENGTH) {
    return safe.substring(0, MAX_NAME_LENGTH);
  }
  return safe.substring(0, MAX_NAME_LENGTH - ext.length) + ext;
}

export function fileExtension(name: string): string {
  return path.extname(name).replace(/^\./, "").toLowerCase();
}

export function isAllowedExtension(name: string): boolean {
  return ALLOWED_EXTENSIONS.includes(fileExtension(name));
}

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * UTC timestamp prefix, e.g. "20250301_140502"
 */
export function timestampPrefix(at: Date): string {
  return (
    `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}` +
    `_${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`
  );
}

/**
 * Build the stored name for an upload: "<timestamp>_<8 hex>_<sanitized name>"
 */
export function buildArtifactName(
  originalName: string,
  at: Date,
  suffix: string = randomBytes(4).toString("hex")
): string {
  const safe = sanitizeFileName(originalName) || "upload";
  return `${timestampPrefix(at)}_${suffix}_${safe}`;
}
