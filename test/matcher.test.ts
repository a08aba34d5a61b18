import { describe, expect, it } from "vitest";
import { comparisonKeyId, matchRecords } from "../apps/backend/src/services/matcher";
import { TARGET_DATE, staffingRecord } from "./helpers/workbookFixtures";

const shiftOrder = ["Day", "Evening", "Night"];
const roleOrder = ["RN", "LPN", "CNA", "Other", "Unspecified"];

describe("matchRecords", () => {
  it("pairs template and actual records on the same key", () => {
    const records = matchRecords(
      [staffingRecord({ hours: 48, patientDays: 12 })],
      [staffingRecord({ hours: 54, patientDays: 12, source: "Actual" })],
      { shiftOrder },
    );

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      key: { unit: "ICU", shift: "Day", date: TARGET_DATE },
      status: "Matched",
      templateHours: 48,
      actualHours: 54,
      templatePatientDays: 12,
      actualPatientDays: 12,
      actualCensusFromTemplate: false,
    });
  });

  it("keeps the missing side undefined for unmatched keys", () => {
    const [record] = matchRecords(
      [],
      [staffingRecord({ unit: "ER", shift: "Night", hours: 30, patientDays: 10, source: "Actual" })],
      { shiftOrder },
    );

    expect(record.status).toBe("ActualOnly");
    expect(record.templateHours).toBeUndefined();
    expect(record.templatePatientDays).toBeUndefined();
    expect(record.actualHours).toBe(30);
  });

  it("sums per side and per role", () => {
    const [record] = matchRecords(
      [
        staffingRecord({ role: "CNA", hours: 12, patientDays: 0 }),
        staffingRecord({ role: "RN", hours: 36, patientDays: 12, note: "Float" }),
      ],
      [
        staffingRecord({ role: "RN", hours: 40, patientDays: 12, source: "Actual", note: "Float" }),
        staffingRecord({ role: "LPN", hours: 8, patientDays: 0, source: "Actual", note: "Agency" }),
      ],
      { shiftOrder, roleOrder },
    );

    expect(record.templateHours).toBe(48);
    expect(record.actualHours).toBe(48);
    expect(record.templatePatientDays).toBe(12);
    expect(record.roles).toEqual([
      { role: "RN", templateHours: 36, actualHours: 40 },
      { role: "LPN", actualHours: 8 },
      { role: "CNA", templateHours: 12 },
    ]);
    expect(record.notes).toEqual(["Float", "Agency"]);
  });

  it("treats unit labels that differ only in case and spacing as one key", () => {
    const records = matchRecords(
      [staffingRecord({ unit: "Med  Surg", hours: 40, patientDays: 20 })],
      [staffingRecord({ unit: "med surg", hours: 42, patientDays: 20, source: "Actual" })],
      { shiftOrder },
    );

    expect(records.map((r) => [r.key.unit, r.status])).toEqual([["Med Surg", "Matched"]]);
  });

  it("emits exactly one record per key, sorted by unit, shift order and date", () => {
    const records = matchRecords(
      [
        staffingRecord({ unit: "ICU", shift: "Night", hours: 24, patientDays: 12 }),
        staffingRecord({ unit: "ICU", shift: "Day", hours: 48, patientDays: 12 }),
        staffingRecord({ unit: "ICU", shift: "Day", hours: 8, patientDays: 0 }),
      ],
      [
        staffingRecord({ unit: "cardiac", shift: "Evening", hours: 16, patientDays: 4, source: "Actual" }),
        staffingRecord({ unit: "ER", shift: "Day", hours: 20, patientDays: 5, source: "Actual" }),
        staffingRecord({ unit: "ICU", shift: "Night", hours: 22, patientDays: 12, source: "Actual" }),
      ],
      { shiftOrder },
    );

    expect(records.map((r) => [r.key.unit, r.key.shift, r.status])).toEqual([
      ["cardiac", "Evening", "ActualOnly"],
      ["ER", "Day", "ActualOnly"],
      ["ICU", "Day", "TemplateOnly"],
      ["ICU", "Night", "Matched"],
    ]);
    expect(new Set(records.map((r) => comparisonKeyId(r.key))).size).toBe(records.length);
    expect(records[2].templateHours).toBe(56);
  });
});
