import { isAssignmentCategory, isPastDue, parseDueDate } from "./assignment";

describe("parseDueDate", () => {
  it("treats empty values as no due date", () => {
    expect(parseDueDate(undefined)).toBeNull();
    expect(parseDueDate(null)).toBeNull();
    expect(parseDueDate("")).toBeNull();
  });

  it("reads YYYY-MM-DD as midnight UTC", () => {
    expect(parseDueDate("2025-03-17")).toBe("2025-03-17T00:00:00.000Z");
  });

  it("reads full ISO timestamps", () => {
    expect(parseDueDate("2025-03-17T09:30:00Z")).toBe("2025-03-17T09:30:00.000Z");
  });

  it("accepts dates in the past", () => {
    expect(parseDueDate("1999-12-31")).toBe("1999-12-31T00:00:00.000Z");
  });

  it("rejects text that is not a date", () => {
    expect(parseDueDate("next friday")).toBeUndefined();
    expect(parseDueDate(20250317)).toBeUndefined();
  });

  it("rejects impossible calendar dates", () => {
    expect(parseDueDate("2025-02-30")).toBeUndefined();
  });
});

describe("isPastDue", () => {
  const at = new Date("2025-03-10T12:00:00.000Z");

  it("is never late without a due date", () => {
    expect(isPastDue({ dueAt: null }, at)).toBe(false);
  });

  it("is late only after the due instant", () => {
    expect(isPastDue({ dueAt: "2025-03-10T11:59:59.000Z" }, at)).toBe(true);
    expect(isPastDue({ dueAt: "2025-03-10T12:00:00.000Z" }, at)).toBe(false);
    expect(isPastDue({ dueAt: "2025-03-11T00:00:00.000Z" }, at)).toBe(false);
  });
});

describe("isAssignmentCategory", () => {
  it("accepts known categories only", () => {
    expect(isAssignmentCategory("quiz")).toBe(true);
    expect(isAssignmentCategory("essay")).toBe(false);
    expect(isAssignmentCategory(3)).toBe(false);
  });
});
