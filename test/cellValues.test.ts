import { describe, expect, it } from "vitest";
import {
  cellText,
  excelSerialToIsoDate,
  isBlankRow,
  parseDateCell,
  parseNumericCell,
} from "../apps/backend/src/utils/cellValues";

describe("parseNumericCell", () => {
  it("accepts numbers and numeric text", () => {
    expect(parseNumericCell(48)).toBe(48);
    expect(parseNumericCell(" 48 ")).toBe(48);
    expect(parseNumericCell("1,234.5")).toBe(1234.5);
    expect(parseNumericCell(".5")).toBe(0.5);
  });

  it("reads accounting parentheses as negative", () => {
    expect(parseNumericCell("(2)")).toBe(-2);
  });

  it("treats blank cells as zero", () => {
    expect(parseNumericCell("")).toBe(0);
    expect(parseNumericCell("  ")).toBe(0);
    expect(parseNumericCell("-")).toBe(0);
    expect(parseNumericCell(null)).toBe(0);
    expect(parseNumericCell(undefined)).toBe(0);
  });

  it("returns null for text that is not a number", () => {
    expect(parseNumericCell("abc")).toBeNull();
    expect(parseNumericCell("12h")).toBeNull();
    expect(parseNumericCell(true)).toBeNull();
    expect(parseNumericCell(Number.NaN)).toBeNull();
  });
});

describe("excelSerialToIsoDate", () => {
  it("converts 1900-system serials", () => {
    expect(excelSerialToIsoDate(45301)).toBe("2024-01-10");
    expect(excelSerialToIsoDate(45292)).toBe("2024-01-01");
    expect(excelSerialToIsoDate(45301.75)).toBe("2024-01-10");
  });

  it("converts 1904-system serials", () => {
    expect(excelSerialToIsoDate(43839, true)).toBe("2024-01-10");
  });

  it("rejects serials outside the Excel range", () => {
    expect(excelSerialToIsoDate(0)).toBeNull();
    expect(excelSerialToIsoDate(3000000)).toBeNull();
  });
});

describe("parseDateCell", () => {
  it.each([
    ["2024-01-10", "2024-01-10"],
    ["2024-01-10T07:00:00", "2024-01-10"],
    ["2024-01-10 07:00", "2024-01-10"],
    ["2024/1/10", "2024-01-10"],
    ["1/10/2024", "2024-01-10"],
    ["01/10/24", "2024-01-10"],
  ])("parses %s", (input, expected) => {
    expect(parseDateCell(input)).toBe(expected);
  });

  it("parses serials and Date objects", () => {
    expect(parseDateCell(45301)).toBe("2024-01-10");
    expect(parseDateCell(new Date(Date.UTC(2024, 0, 10)))).toBe("2024-01-10");
  });

  it("rejects impossible or unrecognized dates", () => {
    expect(parseDateCell("2024-02-30")).toBeNull();
    expect(parseDateCell("13/01/2024")).toBeNull();
    expect(parseDateCell("Jan 10")).toBeNull();
    expect(parseDateCell("")).toBeNull();
    expect(parseDateCell(null)).toBeNull();
  });
});

describe("cellText / isBlankRow", () => {
  it("collapses whitespace", () => {
    expect(cellText("  Med   Surg ")).toBe("Med Surg");
    expect(cellText(12)).toBe("12");
    expect(cellText(undefined)).toBe("");
  });

  it("treats rows of empty strings as blank", () => {
    expect(isBlankRow(["", "  ", null])).toBe(true);
    expect(isBlankRow(undefined)).toBe(true);
    expect(isBlankRow(["", 0])).toBe(false);
  });
});
