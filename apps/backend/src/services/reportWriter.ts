import ExcelJS from "exceljs";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import {
  NOT_AVAILABLE,
  REPORT_SHEETS,
  type ComparisonRecord,
  type HppdTargetBand,
  type ProcessingWarning,
  type ShiftName,
  type SplitTargetBand,
  type StaffRole,
} from "@hppd/shared";
import { sortComparisonRecords } from "./matcher";
import { summarizeByUnitShift, type SummaryRow } from "./varianceCalculator";

export interface ReportMetadata {
  jobId: string;
  targetDate: string;
  generatedAt: Date;
  templateFiles: number;
  actualFiles: number;
  warnings: readonly ProcessingWarning[];
  targetBand: HppdTargetBand;
  splitBand: SplitTargetBand;
}

export const HOURS_FORMAT = "0.00";
export const HPPD_FORMAT = "0.000";
export const VARIANCE_FORMAT = "+0.000;-0.000;0.000";

const FILL_OVER = "FFFFCDD2";
const FILL_UNDER = "FFC8E6C9";
const FILL_NO_DATA = "FFFFFACD";
const FILL_HEADER = "FFE6F4EA";

const SPLIT_HEADERS = [
  "Template CNA HPPD",
  "Actual CNA HPPD",
  "Template RN+LPN HPPD",
  "Actual RN+LPN HPPD",
  "Split",
] as const;

const FILE_SKIP_CATEGORIES = new Set(["Hidden File", "Unsupported Format", "Unreadable File", "Malformed Sheet"]);

function solidFill(argb: string): ExcelJS.Fill {
  return { type: "pattern", pattern: "solid", fgColor: { argb } };
}

/** Writes a number with a format, or the N/A placeholder when undefined. */
function setMetric(cell: ExcelJS.Cell, value: number | undefined, numFmt: string): void {
  if (value === undefined) {
    cell.value = NOT_AVAILABLE;
    cell.alignment = { horizontal: "right" };
    cell.font = { italic: true, color: { argb: "FF808080" } };
    return;
  }
  cell.value = value;
  cell.numFmt = numFmt;
}

function setVariance(cell: ExcelJS.Cell, value: number | undefined): void {
  setMetric(cell, value, VARIANCE_FORMAT);
  if (value === undefined) cell.fill = solidFill(FILL_NO_DATA);
  else if (value > 0) cell.fill = solidFill(FILL_OVER);
  else if (value < 0) cell.fill = solidFill(FILL_UNDER);
}

interface SplitFigures {
  templateCnaHPPD?: number;
  actualCnaHPPD?: number;
  templateNurseHPPD?: number;
  actualNurseHPPD?: number;
  splitBand?: string;
}

/** Fills the split columns starting at `first`. */
function setSplit(row: ExcelJS.Row, first: number, figures: SplitFigures): void {
  setMetric(row.getCell(first), figures.templateCnaHPPD, HPPD_FORMAT);
  setMetric(row.getCell(first + 1), figures.actualCnaHPPD, HPPD_FORMAT);
  setMetric(row.getCell(first + 2), figures.templateNurseHPPD, HPPD_FORMAT);
  setMetric(row.getCell(first + 3), figures.actualNurseHPPD, HPPD_FORMAT);
  row.getCell(first + 4).value = figures.splitBand ?? NOT_AVAILABLE;
}

function formatSplitBand(band: SplitTargetBand): string {
  return `CNA ${band.cnaMin.toFixed(2)}-${band.cnaMax.toFixed(2)}, RN+LPN <= ${band.nurseMax.toFixed(2)}`;
}

function styleHeader(row: ExcelJS.Row): void {
  row.eachCell((cell) => {
    cell.font = { bold: true };
    cell.fill = solidFill(FILL_HEADER);
    cell.alignment = { horizontal: "center", vertical: "middle", wrapText: true };
  });
}

function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function reportFileName(generatedAt: Date): string {
  return `HPPD_Comparison_${formatTimestamp(generatedAt)}.xlsx`;
}

/**
 * Renders comparison results into the Summary / Detail / Exceptions workbook.
 */
export class ReportWriter {
  constructor(
    private readonly options: { shiftOrder: readonly ShiftName[]; roleOrder: readonly StaffRole[] },
  ) {}

  async write(records: readonly ComparisonRecord[], meta: ReportMetadata, outputDir: string): Promise<string> {
    const workbook = this.build(records, meta);
    await mkdir(outputDir, { recursive: true });
    const path = join(outputDir, reportFileName(meta.generatedAt));
    await workbook.xlsx.writeFile(path);
    console.log(`[Report] ${meta.jobId}: wrote ${records.length} comparison row(s) to ${path}`);
    return path;
  }

  build(records: readonly ComparisonRecord[], meta: ReportMetadata): ExcelJS.Workbook {
    const sorted = sortComparisonRecords([...records], this.options.shiftOrder);
    const workbook = new ExcelJS.Workbook();
    workbook.creator = "HPPD Variance Service";
    workbook.created = meta.generatedAt;

    this.writeSummary(workbook, sorted, meta);
    this.writeDetail(workbook, sorted);
    this.writeExceptions(workbook, sorted, meta.warnings);
    return workbook;
  }

  private writeSummary(workbook: ExcelJS.Workbook, records: ComparisonRecord[], meta: ReportMetadata): void {
    const ws = workbook.addWorksheet(REPORT_SHEETS.SUMMARY);

    const title = ws.addRow(["HPPD Variance Summary"]);
    title.getCell(1).font = { bold: true, size: 16 };

    const count = (status: ComparisonRecord["status"]) => records.filter((r) => r.status === status).length;
    const skippedFiles = meta.warnings.filter((w) => FILE_SKIP_CATEGORIES.has(w.category)).length;
    const skippedRows = meta.warnings.filter((w) => w.category === "Invalid Row").length;

    const facts: [string, string | number][] = [
      ["Target Date", meta.targetDate],
      ["Generated At", meta.generatedAt.toISOString()],
      ["Job ID", meta.jobId],
      ["Template Files", meta.templateFiles],
      ["Actual Files", meta.actualFiles],
      ["Skipped Files", skippedFiles],
      ["Skipped Rows", skippedRows],
      ["Matched Keys", count("Matched")],
      ["Template-Only Keys", count("TemplateOnly")],
      ["Actual-Only Keys", count("ActualOnly")],
      ["Target HPPD Band", `${meta.targetBand.min.toFixed(3)}-${meta.targetBand.max.toFixed(3)}`],
      ["Target Split", formatSplitBand(meta.splitBand)],
    ];
    for (const [label, value] of facts) {
      const row = ws.addRow([label, value]);
      row.getCell(1).font = { bold: true };
    }
    ws.addRow([]);

    const header = ws.addRow([
      "Unit",
      "Shift",
      "Template Hours",
      "Actual Hours",
      "Template Patient Days",
      "Actual Patient Days",
      "Template HPPD",
      "Actual HPPD",
      "HPPD Variance",
      "Band",
      ...SPLIT_HEADERS,
      "Matched Keys",
      "Unmatched Keys",
      "Keys Without Patient Days",
    ]);
    styleHeader(header);
    ws.views = [{ state: "frozen", xSplit: 0, ySplit: header.number }];

    for (const summary of summarizeByUnitShift(records, meta.targetBand, meta.splitBand)) {
      this.writeSummaryRow(ws, summary);
    }

    [18, 14, 15, 15, 18, 18, 15, 15, 15, 16, 16, 16, 20, 20, 12, 14, 16, 18].forEach((width, i) => {
      ws.getColumn(i + 1).width = width;
    });
  }

  private writeSummaryRow(ws: ExcelJS.Worksheet, summary: SummaryRow): void {
    const row = ws.addRow([summary.unit, summary.shift]);
    setMetric(row.getCell(3), summary.templateHours, HOURS_FORMAT);
    setMetric(row.getCell(4), summary.actualHours, HOURS_FORMAT);
    setMetric(row.getCell(5), summary.templatePatientDays, HOURS_FORMAT);
    setMetric(row.getCell(6), summary.actualPatientDays, HOURS_FORMAT);
    setMetric(row.getCell(7), summary.templateHPPD, HPPD_FORMAT);
    setMetric(row.getCell(8), summary.actualHPPD, HPPD_FORMAT);
    setVariance(row.getCell(9), summary.hppdVariance);
    row.getCell(10).value = summary.band ?? NOT_AVAILABLE;
    setSplit(row, 11, summary);
    row.getCell(16).value = summary.matchedKeys;
    row.getCell(17).value = summary.unmatchedKeys;
    row.getCell(18).value = summary.keysWithoutPatientDays;
    if (summary.kind !== "shift") {
      row.eachCell((cell) => {
        cell.font = { ...cell.font, bold: true };
      });
    }
  }

  private writeDetail(workbook: ExcelJS.Workbook, records: ComparisonRecord[]): void {
    const ws = workbook.addWorksheet(REPORT_SHEETS.DETAIL);

    const present = new Set(records.flatMap((r) => r.roles.map((role) => role.role)));
    const roles = [
      ...this.options.roleOrder.filter((r) => present.has(r)),
      ...[...present].filter((r) => !this.options.roleOrder.includes(r)).sort(),
    ];

    const header = ws.addRow([
      "Unit",
      "Shift",
      "Date",
      "Status",
      "Template Hours",
      "Actual Hours",
      "Template Patient Days",
      "Actual Patient Days",
      "Template HPPD",
      "Actual HPPD",
      "HPPD Variance",
      "Band",
      ...SPLIT_HEADERS,
      ...roles.flatMap((role) => [`${role} Template Hours`, `${role} Actual Hours`]),
      "Notes",
    ]);
    styleHeader(header);
    ws.views = [{ state: "frozen", xSplit: 0, ySplit: 1 }];

    const firstRoleCol = 13 + SPLIT_HEADERS.length;
    const notesCol = firstRoleCol + roles.length * 2;

    for (const record of records) {
      const row = ws.addRow([record.key.unit, record.key.shift, record.key.date, record.status]);
      setMetric(row.getCell(5), record.templateHours, HOURS_FORMAT);
      setMetric(row.getCell(6), record.actualHours, HOURS_FORMAT);
      setMetric(row.getCell(7), record.templatePatientDays, HOURS_FORMAT);
      setMetric(row.getCell(8), record.actualPatientDays, HOURS_FORMAT);
      setMetric(row.getCell(9), record.templateHPPD, HPPD_FORMAT);
      setMetric(row.getCell(10), record.actualHPPD, HPPD_FORMAT);
      setVariance(row.getCell(11), record.hppdVariance);
      row.getCell(12).value = record.band ?? NOT_AVAILABLE;
      setSplit(row, 13, record);

      roles.forEach((role, i) => {
        const hours = record.roles.find((r) => r.role === role);
        const templateCol = firstRoleCol + i * 2;
        setMetric(row.getCell(templateCol), record.status === "ActualOnly" ? undefined : hours?.templateHours ?? 0, HOURS_FORMAT);
        setMetric(row.getCell(templateCol + 1), record.status === "TemplateOnly" ? undefined : hours?.actualHours ?? 0, HOURS_FORMAT);
      });

      const notes = [...record.notes];
      if (record.actualCensusFromTemplate) notes.push("Actual HPPD uses template patient days");
      row.getCell(notesCol).value = notes.join("; ");

      if (record.status !== "Matched") {
        for (let c = 1; c <= 4; c++) row.getCell(c).fill = solidFill(FILL_NO_DATA);
      }
    }

    ws.getColumn(1).width = 18;
    ws.getColumn(2).width = 12;
    ws.getColumn(3).width = 12;
    ws.getColumn(4).width = 14;
    for (let c = 5; c < notesCol; c++) ws.getColumn(c).width = 16;
    ws.getColumn(notesCol).width = 40;
  }

  private writeExceptions(
    workbook: ExcelJS.Workbook,
    records: ComparisonRecord[],
    warnings: readonly ProcessingWarning[],
  ): void {
    const ws = workbook.addWorksheet(REPORT_SHEETS.EXCEPTIONS);

    ws.addRow(["Unmatched Keys"]).getCell(1).font = { bold: true, size: 14 };
    const unmatched = records.filter((r) => r.status !== "Matched");
    if (unmatched.length === 0) {
      ws.addRow(["No unmatched keys."]);
    } else {
      styleHeader(ws.addRow(["Unit", "Shift", "Date", "Status", "Hours", "Patient Days", "Detail"]));
      for (const record of unmatched) {
        const templateOnly = record.status === "TemplateOnly";
        const row = ws.addRow([record.key.unit, record.key.shift, record.key.date, record.status]);
        setMetric(row.getCell(5), templateOnly ? record.templateHours : record.actualHours, HOURS_FORMAT);
        setMetric(row.getCell(6), templateOnly ? record.templatePatientDays : record.actualPatientDays, HOURS_FORMAT);
        row.getCell(7).value = templateOnly
          ? "Planned in the labor template but missing from actual reports"
          : "Reported as worked but missing from the labor template";
      }
    }

    ws.addRow([]);
    ws.addRow(["Processing Warnings"]).getCell(1).font = { bold: true, size: 14 };
    if (warnings.length === 0) {
      ws.addRow(["No processing warnings."]);
    } else {
      styleHeader(ws.addRow(["Source", "File", "Sheet", "Row", "Category", "Message"]));
      for (const w of warnings) {
        ws.addRow([w.source, w.file, w.sheet ?? "", w.row ?? "", w.category, w.message]);
      }
    }

    [18, 40, 14, 14, 18, 60, 60].forEach((width, i) => {
      ws.getColumn(i + 1).width = width;
    });
  }
}
