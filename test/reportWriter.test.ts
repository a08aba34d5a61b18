import ExcelJS from "exceljs";
import { basename } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { rm } from "node:fs/promises";
import type { ComparisonRecord, ProcessingWarning } from "@hppd/shared";
import { ReportWriter, reportFileName } from "../apps/backend/src/services/reportWriter";
import { calculateVariance } from "../apps/backend/src/services/varianceCalculator";
import { TARGET_DATE, comparisonRecord, loadProfile, tempDir } from "./helpers/workbookFixtures";

const profile = loadProfile();
const band = { min: 3.0, max: 3.3 };
const splitBand = { cnaMin: 2.0, cnaMax: 2.06, nurseMax: 1.2 };

const records: ComparisonRecord[] = calculateVariance(
  [
    comparisonRecord({
      templateHours: 48,
      actualHours: 54,
      templatePatientDays: 12,
      actualPatientDays: 12,
      roles: [{ role: "RN", templateHours: 48, actualHours: 54 }],
      notes: ["Float from 4W"],
    }),
    comparisonRecord({
      key: { unit: "ER", shift: "Night", date: TARGET_DATE },
      status: "ActualOnly",
      actualHours: 30,
      actualPatientDays: 10,
      roles: [{ role: "RN", actualHours: 30 }],
    }),
  ],
  { censusFallback: "none", targetBand: band, splitBand },
);

const warnings: ProcessingWarning[] = [
  { source: "Template", file: "__MACOSX/._a.xlsx", category: "Hidden File", message: "macOS metadata file, skipped" },
  {
    source: "Actual",
    file: "actuals.csv",
    sheet: "actuals",
    row: 7,
    category: "Invalid Row",
    message: "Unrecognized shift label 'Swing'",
  },
];

describe("reportFileName", () => {
  it("stamps the local generation time", () => {
    expect(reportFileName(new Date(2024, 0, 10, 8, 30, 5))).toBe("HPPD_Comparison_20240110_083005.xlsx");
  });
});

describe("ReportWriter", () => {
  let dir: string;
  let workbook: ExcelJS.Workbook;
  let path: string;

  beforeAll(async () => {
    dir = await tempDir("hppd-report-");
    const writer = new ReportWriter({ shiftOrder: profile.shiftOrder, roleOrder: profile.roleOrder });
    path = await writer.write(
      records,
      {
        jobId: "job-42",
        targetDate: TARGET_DATE,
        generatedAt: new Date(2024, 0, 10, 8, 30, 0),
        templateFiles: 1,
        actualFiles: 1,
        warnings,
        targetBand: band,
        splitBand,
      },
      dir,
    );
    workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(path);
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function sheet(name: string): ExcelJS.Worksheet {
    const ws = workbook.getWorksheet(name);
    if (!ws) throw new Error(`missing sheet ${name}`);
    return ws;
  }

  it("writes the three sheets under a timestamped name", () => {
    expect(basename(path)).toBe("HPPD_Comparison_20240110_083000.xlsx");
    expect(workbook.worksheets.map((ws) => ws.name)).toEqual(["Summary", "Detail", "Exceptions"]);
  });

  it("lists every key on the detail sheet with N/A for missing figures", () => {
    const ws = sheet("Detail");

    expect([13, 14, 15, 16, 17].map((c) => ws.getRow(1).getCell(c).value)).toEqual([
      "Template CNA HPPD",
      "Actual CNA HPPD",
      "Template RN+LPN HPPD",
      "Actual RN+LPN HPPD",
      "Split",
    ]);
    expect(ws.getRow(1).getCell(18).value).toBe("RN Template Hours");
    expect(ws.getRow(1).getCell(19).value).toBe("RN Actual Hours");
    expect(ws.getRow(1).getCell(20).value).toBe("Notes");

    const er = ws.getRow(2);
    expect([1, 2, 3, 4].map((c) => er.getCell(c).value)).toEqual(["ER", "Night", TARGET_DATE, "ActualOnly"]);
    expect(er.getCell(5).value).toBe("N/A");
    expect(er.getCell(6).value).toBe(30);
    expect(er.getCell(9).value).toBe("N/A");
    expect(er.getCell(10).value).toBe(3);
    expect(er.getCell(11).value).toBe("N/A");
    expect(er.getCell(12).value).toBe("Within Target");
    expect([13, 14, 15, 16, 17].map((c) => er.getCell(c).value)).toEqual(["N/A", 0, "N/A", 3, "Bad Split"]);
    expect(er.getCell(18).value).toBe("N/A");
    expect(er.getCell(19).value).toBe(30);

    const icu = ws.getRow(3);
    expect(icu.getCell(1).value).toBe("ICU");
    expect(icu.getCell(9).value).toBe(4);
    expect(icu.getCell(9).numFmt).toBe("0.000");
    expect(icu.getCell(10).value).toBe(4.5);
    expect(icu.getCell(11).value).toBe(0.5);
    expect(icu.getCell(11).numFmt).toBe("+0.000;-0.000;0.000");
    expect(icu.getCell(5).numFmt).toBe("0.00");
    expect([15, 16, 17].map((c) => icu.getCell(c).value)).toEqual([4, 4.5, "Bad Split"]);
    expect(icu.getCell(16).numFmt).toBe("0.000");
    expect(icu.getCell(20).value).toBe("Float from 4W");

    expect(ws.rowCount).toBe(3);
  });

  it("summarizes counts and per unit/shift totals", () => {
    const ws = sheet("Summary");

    expect(ws.getRow(1).getCell(1).value).toBe("HPPD Variance Summary");
    const facts = new Map<string, unknown>();
    for (let r = 2; r <= 13; r++) facts.set(String(ws.getRow(r).getCell(1).value), ws.getRow(r).getCell(2).value);
    expect(Object.fromEntries(facts)).toMatchObject({
      "Target Date": TARGET_DATE,
      "Job ID": "job-42",
      "Template Files": 1,
      "Actual Files": 1,
      "Skipped Files": 1,
      "Skipped Rows": 1,
      "Matched Keys": 1,
      "Template-Only Keys": 0,
      "Actual-Only Keys": 1,
      "Target HPPD Band": "3.000-3.300",
      "Target Split": "CNA 2.00-2.06, RN+LPN <= 1.20",
    });

    const header = ws.getRow(15);
    expect(header.getCell(1).value).toBe("Unit");
    expect([15, 16, 17, 18].map((c) => header.getCell(c).value)).toEqual([
      "Split",
      "Matched Keys",
      "Unmatched Keys",
      "Keys Without Patient Days",
    ]);

    expect(ws.getRow(16).getCell(1).value).toBe("ER");
    expect(ws.getRow(16).getCell(3).value).toBe("N/A");
    expect(ws.getRow(16).getCell(15).value).toBe("N/A");
    expect(ws.getRow(16).getCell(17).value).toBe(1);

    const icu = ws.getRow(17);
    expect(icu.getCell(1).value).toBe("ICU");
    expect(icu.getCell(9).value).toBe(0.5);
    expect([13, 14, 15, 16, 17, 18].map((c) => icu.getCell(c).value)).toEqual([4, 4.5, "Bad Split", 1, 0, 0]);

    expect([1, 2].map((c) => ws.getRow(18).getCell(c).value)).toEqual(["All Units", "All Shifts"]);
    expect(ws.getRow(18).getCell(4).value).toBe(54);
  });

  it("lists unmatched keys and processing warnings on the exceptions sheet", () => {
    const ws = sheet("Exceptions");

    expect(ws.getRow(1).getCell(1).value).toBe("Unmatched Keys");
    expect([1, 2, 3, 4, 5, 6, 7].map((c) => ws.getRow(3).getCell(c).value)).toEqual([
      "ER",
      "Night",
      TARGET_DATE,
      "ActualOnly",
      30,
      10,
      "Reported as worked but missing from the labor template",
    ]);
    expect(ws.getRow(5).getCell(1).value).toBe("Processing Warnings");
    expect(ws.getRow(6).getCell(6).value).toBe("Message");
    expect([1, 2, 3, 4, 5, 6].map((c) => ws.getRow(8).getCell(c).value)).toEqual([
      "Actual",
      "actuals.csv",
      "actuals",
      7,
      "Invalid Row",
      "Unrecognized shift label 'Swing'",
    ]);
  });

  it("says so when there is nothing to report", () => {
    const writer = new ReportWriter({ shiftOrder: profile.shiftOrder, roleOrder: profile.roleOrder });
    const empty = writer.build([], {
      jobId: "job-0",
      targetDate: TARGET_DATE,
      generatedAt: new Date(2024, 0, 10),
      templateFiles: 1,
      actualFiles: 1,
      warnings: [],
      targetBand: band,
      splitBand,
    });
    const ws = empty.getWorksheet("Exceptions");

    expect(ws?.getRow(2).getCell(1).value).toBe("No unmatched keys.");
    expect(ws?.getRow(5).getCell(1).value).toBe("No processing warnings.");
  });
});
