import { toIsoDate } from "@hppd/shared";

const MS_PER_DAY = 24 * 60 * 60 * 1000;
// Serial 0 of the 1900 date system; using Dec 30 absorbs Excel's phantom 1900-02-29.
const EXCEL_EPOCH_1900 = Date.UTC(1899, 11, 30);
const EXCEL_1904_OFFSET_DAYS = 1462;
const MAX_EXCEL_SERIAL = 2958465; // 9999-12-31

export function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "" : value.toISOString().slice(0, 10);
  }
  return String(value).replace(/\s+/g, " ").trim();
}

export function isBlankCell(value: unknown): boolean {
  return cellText(value) === "";
}

export function isBlankRow(row: readonly unknown[] | undefined): boolean {
  if (!row) return true;
  for (const cell of row) {
    if (!isBlankCell(cell)) return false;
  }
  return true;
}

/**
 * Numbers stored as numbers or as text ("1,234.5", " 48 ", "(2)").
 * Blank → 0, anything else unparseable → null.
 */
export function parseNumericCell(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return value === null || value === undefined ? 0 : null;

  let text = value.trim();
  if (text === "" || text === "-") return 0;

  let sign = 1;
  const wrapped = /^\((.*)\)$/.exec(text);
  if (wrapped) {
    sign = -1;
    text = wrapped[1];
  }
  text = text.replace(/[,\s]/g, "");
  if (!/^[+-]?(\d+\.?\d*|\.\d+)$/.test(text)) return null;

  const num = Number(text);
  return Number.isFinite(num) ? sign * num : null;
}

export function excelSerialToIsoDate(serial: number, date1904 = false): string | null {
  if (!Number.isFinite(serial) || serial < 1 || serial > MAX_EXCEL_SERIAL) return null;
  const days = Math.floor(serial) + (date1904 ? EXCEL_1904_OFFSET_DAYS : 0);
  const date = new Date(EXCEL_EPOCH_1900 + days * MS_PER_DAY);
  return toIsoDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

/**
 * Date cells as Excel serials, ISO text (time part ignored), YYYY/MM/DD or US M/D/Y.
 */
export function parseDateCell(value: unknown, date1904 = false): string | null {
  if (typeof value === "number") return excelSerialToIsoDate(value, date1904);
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return toIsoDate(value.getUTCFullYear(), value.getUTCMonth() + 1, value.getUTCDate());
  }
  if (typeof value !== "string") return null;

  const text = value.trim();
  let m = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T\s].*)?$/.exec(text);
  if (m) return toIsoDate(Number(m[1]), Number(m[2]), Number(m[3]));

  m = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})(?:\s.*)?$/.exec(text);
  if (m) {
    const year = m[3].length === 2 ? 2000 + Number(m[3]) : Number(m[3]);
    return toIsoDate(year, Number(m[1]), Number(m[2]));
  }

  return null;
}
