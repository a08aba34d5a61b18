import * as XLSX from "xlsx";
import { parse } from "csv-parse/sync";
import { posix } from "node:path";
import type { ProcessingWarning, RecordSource, StaffingRecord } from "@hppd/shared";
import { MalformedSheetError, describeError } from "../errors";
import { cellText, isBlankCell, isBlankRow, parseDateCell, parseNumericCell } from "../utils/cellValues";
import { ColumnResolver, type ResolvedColumns } from "./columnResolver";
import { normalizeLabel, type ParserProfile } from "./parserProfile";
import type { ExtractedFile } from "./archiveExtractor";

export interface SheetTable {
  name: string;
  rows: unknown[][];
  // Spreadsheet row number of rows[0]
  firstRowNumber: number;
  date1904: boolean;
}

export interface ParseContext {
  source: RecordSource;
  targetDate: string;
}

export interface ParseResult {
  records: StaffingRecord[];
  warnings: ProcessingWarning[];
  rowsRead: number;
  rowsOutsideDate: number;
}

interface TableResult {
  records: StaffingRecord[];
  warnings: ProcessingWarning[];
  rowsRead: number;
  rowsOutsideDate: number;
}

const TOTALS_ROW = /^(grand |sub ?)?totals?$/;
const DAY_SHEET = /^\d{1,2}$/;

/**
 * Reads one spreadsheet file into normalized staffing records for a single
 * target date. Per-file and per-row problems are returned as warnings.
 */
export class RecordParser {
  private readonly resolver: ColumnResolver;

  constructor(private readonly profile: ParserProfile) {
    this.resolver = new ColumnResolver(profile.columns, profile.headerScanRows);
  }

  parseFile(file: ExtractedFile, ctx: ParseContext): ParseResult {
    const result: ParseResult = { records: [], warnings: [], rowsRead: 0, rowsOutsideDate: 0 };

    let tables: SheetTable[];
    try {
      tables = RecordParser.readTables(file);
    } catch (e) {
      result.warnings.push({
        source: ctx.source,
        file: file.path,
        category: "Unreadable File",
        message: `Could not open spreadsheet: ${describeError(e).slice(0, 160)}`,
      });
      return result;
    }

    const targetDay = String(Number(ctx.targetDate.slice(8, 10)));
    const candidates = tables.filter((t) => !DAY_SHEET.test(t.name.trim()) || t.name.trim().replace(/^0/, "") === targetDay);

    let firstFailure: MalformedSheetError | undefined;
    let parsedSheets = 0;

    for (const table of candidates) {
      try {
        const tableResult = this.parseTable(table, file.path, ctx);
        parsedSheets++;
        result.records.push(...tableResult.records);
        result.warnings.push(...tableResult.warnings);
        result.rowsRead += tableResult.rowsRead;
        result.rowsOutsideDate += tableResult.rowsOutsideDate;
      } catch (e) {
        if (!(e instanceof MalformedSheetError)) throw e;
        firstFailure ??= e;
      }
    }

    if (parsedSheets === 0) {
      const message =
        candidates.length === 0
          ? `No sheet for day ${targetDay} and no other sheets to read`
          : firstFailure?.message ?? "No readable sheet";
      result.warnings.push({ source: ctx.source, file: file.path, category: "Malformed Sheet", message });
    }

    return result;
  }

  /**
   * Parses one sheet. Throws MalformedSheetError when the required columns
   * cannot be located near the top of the sheet.
   */
  parseTable(table: SheetTable, fileName: string, ctx: ParseContext): TableResult {
    const outcome = this.resolver.resolve(table.rows);
    if (!outcome.ok) {
      throw new MalformedSheetError(
        `Sheet '${table.name}': could not locate required column(s) ${outcome.missing.join(", ")} in the first ${this.profile.headerScanRows} rows`,
        outcome.missing,
      );
    }

    const { headerRow, columns } = outcome.resolved;
    const out: TableResult = { records: [], warnings: [], rowsRead: 0, rowsOutsideDate: 0 };

    for (let i = headerRow + 1; i < table.rows.length; i++) {
      const row = table.rows[i];
      if (isBlankRow(row)) continue;

      const rowNumber = table.firstRowNumber + i;
      const warn = (message: string) =>
        out.warnings.push({ source: ctx.source, file: fileName, sheet: table.name, row: rowNumber, category: "Invalid Row", message });

      const record = this.parseRow(row, columns, table, warn, ctx);
      if (record === "skip") continue;
      out.rowsRead++;
      if (record === "invalid") continue;
      if (record === "outside") {
        out.rowsOutsideDate++;
        continue;
      }
      out.records.push({ ...record, origin: { file: fileName, sheet: table.name, row: rowNumber } });
    }

    return out;
  }

  private parseRow(
    row: unknown[],
    columns: ResolvedColumns["columns"],
    table: SheetTable,
    warn: (message: string) => void,
    ctx: ParseContext,
  ): Omit<StaffingRecord, "origin"> | "skip" | "invalid" | "outside" {
    const cell = (idx: number | undefined): unknown => (idx === undefined ? undefined : row[idx]);

    const rawUnit = cellText(cell(columns.unit));
    const rawShift = cell(columns.shift);
    const rawDate = cell(columns.date);
    const rawHours = cell(columns.hours);

    // Footers, notes and section titles carry no shift, date or hours.
    if (isBlankCell(rawShift) && isBlankCell(rawDate) && isBlankCell(rawHours)) return "skip";
    if (TOTALS_ROW.test(normalizeLabel(rawUnit))) return "skip";

    const unit = this.profile.cleanUnitLabel(rawUnit);
    if (!unit) {
      warn("Missing unit");
      return "invalid";
    }

    const date = parseDateCell(rawDate, table.date1904);
    if (!date) {
      warn(`Unrecognized date '${cellText(rawDate)}'`);
      return "invalid";
    }
    // Other reporting periods are dropped before any further validation.
    if (date !== ctx.targetDate) return "outside";

    const shift = this.profile.resolveShift(rawShift);
    if (!shift) {
      warn(`Unrecognized shift label '${cellText(rawShift)}'`);
      return "invalid";
    }

    const hours = parseNumericCell(rawHours);
    if (hours === null || hours < 0) {
      warn(`Invalid hours value '${cellText(rawHours)}'`);
      return "invalid";
    }

    let patientDays = 0;
    if (columns.patientDays !== undefined) {
      const value = parseNumericCell(cell(columns.patientDays));
      if (value === null || value < 0) {
        warn(`Invalid patient days value '${cellText(cell(columns.patientDays))}'`);
        return "invalid";
      }
      patientDays = value;
    } else if (columns.census !== undefined) {
      const census = parseNumericCell(cell(columns.census));
      if (census === null || census < 0) {
        warn(`Invalid census value '${cellText(cell(columns.census))}'`);
        return "invalid";
      }
      patientDays = (census * (this.profile.shiftHours(shift) ?? 24)) / 24;
    }

    const note = cellText(cell(columns.note));

    return {
      unit,
      shift,
      date,
      role: this.profile.resolveRole(cell(columns.role)),
      hours,
      patientDays,
      source: ctx.source,
      ...(note ? { note } : {}),
    };
  }

  static readTables(file: ExtractedFile): SheetTable[] {
    if (posix.extname(file.name).toLowerCase() === ".csv") {
      const rows: unknown[][] = parse(file.data, {
        bom: true,
        relax_column_count: true,
        relax_quotes: true,
        skip_empty_lines: false,
      });
      return [{ name: posix.basename(file.name, posix.extname(file.name)), rows, firstRowNumber: 1, date1904: false }];
    }

    const workbook = XLSX.read(file.data, { type: "buffer" });
    const date1904 = workbook.Workbook?.WBProps?.date1904 === true;

    return workbook.SheetNames.map((name) => {
      const sheet = workbook.Sheets[name];
      const ref = sheet?.["!ref"];
      if (!sheet || !ref) return { name, rows: [], firstRowNumber: 1, date1904 };
      const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: "", raw: true, blankrows: true });
      return { name, rows, firstRowNumber: XLSX.utils.decode_range(ref).s.r + 1, date1904 };
    });
  }
}
