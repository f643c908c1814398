import fs from "fs";
import os from "os";
import path from "path";
import { EnrollmentStore } from "./enrollmentStore";
import { ConflictError } from "../domain/errors";

describe("EnrollmentStore", () => {
  let dataDir: string;
  let store: EnrollmentStore;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "enrollments-"));
    store = new EnrollmentStore(dataDir);
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("creates an enrollment and finds it by pair", () => {
    const created = store.create({ classId: "c1", participantId: "p1", enrolledBy: "organizer" });

    expect(store.find("c1", "p1")).toEqual(created);
    expect(store.find("c1", "p2")).toBeNull();
  });

  it("rejects a second enrollment of the same pair with ConflictError", () => {
    store.create({ classId: "c1", participantId: "p1", enrolledBy: "organizer" });

    expect(() =>
      store.create({ classId: "c1", participantId: "p1", enrolledBy: "self" })
    ).toThrow(ConflictError);
    expect(store.findByClass("c1")).toHaveLength(1);
  });

  it("allows the same participant in different classes", () => {
    store.create({ classId: "c1", participantId: "p1", enrolledBy: "organizer" });
    store.create({ classId: "c2", participantId: "p1", enrolledBy: "organizer" });

    expect(store.findByParticipant("p1").map((e) => e.classId)).toEqual(["c1", "c2"]);
  });

  it("persists across store instances", () => {
    store.create({ classId: "c1", participantId: "p1", enrolledBy: "organizer" });

    expect(new EnrollmentStore(dataDir).find("c1", "p1")).not.toBeNull();
  });

  it("delete removes one pair and reports whether it existed", () => {
    store.create({ classId: "c1", participantId: "p1", enrolledBy: "organizer" });
    store.create({ classId: "c1", participantId: "p2", enrolledBy: "organizer" });

    expect(store.delete("c1", "p1")).toBe(true);
    expect(store.delete("c1", "p1")).toBe(false);
    expect(store.findByClass("c1").map((e) => e.participantId)).toEqual(["p2"]);
  });

  it("deleteByClass removes every enrollment of the class", () => {
    store.create({ classId: "c1", participantId: "p1", enrolledBy: "organizer" });
    store.create({ classId: "c1", participantId: "p2", enrolledBy: "organizer" });
    store.create({ classId: "c2", participantId: "p1", enrolledBy: "organizer" });

    expect(store.deleteByClass("c1")).toBe(2);
    expect(store.findByParticipant("p1").map((e) => e.classId)).toEqual(["c2"]);
  });
});
