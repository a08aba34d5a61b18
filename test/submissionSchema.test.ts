import { describe, expect, it } from "vitest";
import { SubmissionFieldsSchema, isCalendarDate, toIsoDate } from "@hppd/shared";

describe("toIsoDate / isCalendarDate", () => {
  it("accepts real calendar days only", () => {
    expect(toIsoDate(2024, 2, 29)).toBe("2024-02-29");
    expect(toIsoDate(2023, 2, 29)).toBeNull();
    expect(toIsoDate(1899, 12, 31)).toBeNull();
    expect(isCalendarDate("2024-01-10")).toBe(true);
    expect(isCalendarDate("2024-1-10")).toBe(false);
    expect(isCalendarDate("2024-13-01")).toBe(false);
  });
});

describe("SubmissionFieldsSchema", () => {
  it("trims and accepts a valid submission", () => {
    expect(SubmissionFieldsSchema.parse({ jobId: " job_01-a ", targetDate: "2024-01-10" })).toEqual({
      jobId: "job_01-a",
      targetDate: "2024-01-10",
    });
  });

  it("names missing fields", () => {
    const result = SubmissionFieldsSchema.safeParse({});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((i) => i.message)).toEqual(["Job identifier is required", "Target date is required"]);
    }
  });

  it("rejects ids that could escape the work directory", () => {
    expect(SubmissionFieldsSchema.safeParse({ jobId: "../etc", targetDate: "2024-01-10" }).success).toBe(false);
    expect(SubmissionFieldsSchema.safeParse({ jobId: "a".repeat(65), targetDate: "2024-01-10" }).success).toBe(false);
  });
});
