import fs from "fs";
import path from "path";
import { JsonTable } from "./jsonTable";

// Mock fs module
jest.mock("fs");

const mockFs = jest.mocked(fs);

interface Row {
  id: string;
}

describe("JsonTable", () => {
  const DATA_DIR = path.join("/tmp", "coursework-data");
  const FILE = path.join(DATA_DIR, "rows.json");

  beforeEach(() => {
    jest.clearAllMocks();
    mockFs.existsSync.mockReturnValue(true);
  });

  describe("read", () => {
    it("returns an empty table when the file does not exist", () => {
      mockFs.existsSync.mockReturnValue(false);

      const table = new JsonTable<Row>(DATA_DIR, "rows.json");

      expect(table.read()).toEqual([]);
      expect(mockFs.readFileSync).not.toHaveBeenCalled();
    });

    it("returns the stored rows", () => {
      mockFs.readFileSync.mockReturnValue(JSON.stringify({ rows: [{ id: "a" }, { id: "b" }] }));

      const table = new JsonTable<Row>(DATA_DIR, "rows.json");

      expect(table.read()).toEqual([{ id: "a" }, { id: "b" }]);
      expect(mockFs.readFileSync).toHaveBeenCalledWith(FILE, "utf-8");
    });

    it("throws on a corrupted file instead of starting fresh", () => {
      mockFs.readFileSync.mockReturnValue("{ not json");

      const table = new JsonTable<Row>(DATA_DIR, "rows.json");

      expect(() => table.read()).toThrow(/^Corrupted table/);
    });

    it("throws when the rows array is missing", () => {
      mockFs.readFileSync.mockReturnValue(JSON.stringify({ items: [] }));

      const table = new JsonTable<Row>(DATA_DIR, "rows.json");

      expect(() => table.read()).toThrow(`Corrupted table ${FILE}: missing rows`);
    });
  });

  describe("write", () => {
    it("writes a temp file and renames it over the table", () => {
      const table = new JsonTable<Row>(DATA_DIR, "rows.json");

      table.write([{ id: "a" }]);

      expect(mockFs.writeFileSync).toHaveBeenCalledWith(
        `${FILE}.tmp`,
        JSON.stringify({ rows: [{ id: "a" }] }, null, 2),
        "utf-8"
      );
      expect(mockFs.renameSync).toHaveBeenCalledWith(`${FILE}.tmp`, FILE);
    });

    it("creates the data directory if it does not exist", () => {
      mockFs.existsSync.mockReturnValue(false);
      const table = new JsonTable<Row>(DATA_DIR, "rows.json");

      table.write([]);

      expect(mockFs.mkdirSync).toHaveBeenCalledWith(DATA_DIR, { recursive: true });
    });
  });
});
