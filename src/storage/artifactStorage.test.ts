import fs from "fs";
import os from "os";
import path from "path";
import { LocalArtifactStorage } from "./artifactStorage";

describe("LocalArtifactStorage", () => {
  let dir: string;
  let uploadDir: string;
  let storage: LocalArtifactStorage;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "artifact-storage-"));
    uploadDir = path.join(dir, "uploads", "assignments");
    storage = new LocalArtifactStorage(uploadDir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("saves a file and returns its reference", async () => {
    const reference = await storage.save("20250310_120000_abcd1234_hw1.pdf", Buffer.from("pdf"));

    expect(reference).toBe("uploads/assignments/20250310_120000_abcd1234_hw1.pdf");
    expect(fs.readFileSync(path.join(uploadDir, "20250310_120000_abcd1234_hw1.pdf"), "utf-8")).toBe("pdf");
  });

  it("refuses to overwrite an existing file", async () => {
    await storage.save("same.txt", Buffer.from("first"));

    await expect(storage.save("same.txt", Buffer.from("second"))).rejects.toThrow();
    expect(fs.readFileSync(path.join(uploadDir, "same.txt"), "utf-8")).toBe("first");
  });

  it("lists stored references", async () => {
    await storage.save("a.txt", Buffer.from("a"));
    await storage.save("b.txt", Buffer.from("b"));

    expect((await storage.list()).sort()).toEqual([
      "uploads/assignments/a.txt",
      "uploads/assignments/b.txt",
    ]);
  });

  it("lists nothing before the first upload", async () => {
    expect(await storage.list()).toEqual([]);
  });

  it("removes a file and reports a missing one", async () => {
    const reference = await storage.save("a.txt", Buffer.from("a"));

    expect(await storage.remove(reference)).toBe(true);
    expect(await storage.remove(reference)).toBe(false);
  });

  it.each(["elsewhere/a.txt", "uploads/assignments/../../secret.txt", "uploads/assignments/"])(
    "rejects the reference %s",
    async (reference) => {
      await expect(storage.remove(reference)).rejects.toThrow(
        `Not a local artifact reference: ${reference}`
      );
    }
  );
});
