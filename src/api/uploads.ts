/**
 * Uploads arrive inside the JSON body as base64, the same way audio does
 * elsewhere in the API:
 *   { "file": { "name": "hw1.pdf", "contentBase64": "JVBERi0..." } }
 * A data URL ("data:application/pdf;base64,...") is accepted too.
 */

import { ValidationError } from "../domain/errors";
import { UploadedFile } from "../services/submissionService";

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export function decodeBase64(content: string): Buffer {
  const payload = content.replace(/^data:[^,]*;base64,/, "").replace(/\s+/g, "");
  if (payload.length % 4 !== 0 || !BASE64.test(payload)) {
    throw new ValidationError("File content is not valid base64");
  }
  return Buffer.from(payload, "base64");
}

/**
 * Read the optional `file` field of a submission body
 */
export function readUpload(value: unknown): UploadedFile | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (
    typeof value !== "object" ||
    !("name" in value) ||
    !("contentBase64" in value) ||
    typeof value.name !== "string" ||
    typeof value.contentBase64 !== "string"
  ) {
    throw new ValidationError("file must have a name and contentBase64");
  }
  if (value.name.trim().length === 0) {
    throw new ValidationError("file name is required");
  }

  return { originalName: value.name.trim(), bytes: decodeBase64(value.contentBase64) };
}
