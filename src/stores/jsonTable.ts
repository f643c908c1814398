/**
 * JSON Table
 *
 * A single JSON file holding every row of one entity, e.g. data/grades.json:
 *   { "rows": [ ... ] }
 *
 * All access is synchronous. A store method that reads, checks and writes a
 * table cannot be interleaved with another request in the same process,
 * which is what the uniqueness rules of the stores rely on.
 */

import fs from "fs";
import path from "path";

interface TableData<T> {
  rows: T[];
}

export class JsonTable<T> {
  readonly filePath: string;

  constructor(dataDir: string, fileName: string) {
    this.filePath = path.join(dataDir, fileName);
  }

  private ensureDir(): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  /**
   * Read all rows. A missing file is an empty table; an unreadable one is an error.
   */
  read(): T[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }

    const raw = fs.readFileSync(this.filePath, "utf-8");
    let data: TableData<T>;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new Error(`Corrupted table ${this.filePath}: ${detail}`);
    }

    if (!data || !Array.isArray(data.rows)) {
      throw new Error(`Corrupted table ${this.filePath}: missing rows`);
    }
    return data.rows;
  }

  /**
   * Replace all rows. Writes a sibling temp file and renames it over the
   * table so readers never see a half-written file.
   */
  write(rows: T[]): void {
    this.ensureDir();
    const tmpPath = `${this.filePath}.tmp`;
    const data: TableData<T> = { rows };
    fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2), "utf-8");
    fs.renameSync(tmpPath, this.filePath);
  }
}
