import {
  CNA_ROLES,
  DEFAULT_SPLIT_BAND,
  NURSE_ROLES,
  type ComparisonRecord,
  type HppdBand,
  type HppdTargetBand,
  type RecordSource,
  type RoleHours,
  type ShiftName,
  type SplitBand,
  type SplitTargetBand,
} from "@hppd/shared";
import type { CensusFallback } from "../config";

export interface VarianceOptions {
  censusFallback: CensusFallback;
  targetBand: HppdTargetBand;
  splitBand?: SplitTargetBand;
}

export interface SummaryRow {
  unit: string;
  shift: ShiftName;
  kind: "shift" | "unit" | "total";
  templateHours?: number;
  actualHours?: number;
  templatePatientDays?: number;
  actualPatientDays?: number;
  templateHPPD?: number;
  actualHPPD?: number;
  hppdVariance?: number;
  band?: HppdBand;
  templateCnaHPPD?: number;
  actualCnaHPPD?: number;
  templateNurseHPPD?: number;
  actualNurseHPPD?: number;
  splitBand?: SplitBand;
  matchedKeys: number;
  unmatchedKeys: number;
  // Matched keys left out of a side's totals because it had no patient days
  keysWithoutPatientDays: number;
}

export const ALL_SHIFTS = "All Shifts";
export const ALL_UNITS = "All Units";

/** Undefined when either figure is missing or the denominator is not positive. */
export function computeHppd(hours: number | undefined, patientDays: number | undefined): number | undefined {
  if (hours === undefined || patientDays === undefined) return undefined;
  if (!(patientDays > 0)) return undefined;
  return hours / patientDays;
}

export function computeVariance(actualHPPD: number | undefined, templateHPPD: number | undefined): number | undefined {
  if (actualHPPD === undefined || templateHPPD === undefined) return undefined;
  return actualHPPD - templateHPPD;
}

export function classifyHppd(hppd: number | undefined, band: HppdTargetBand): HppdBand | undefined {
  if (hppd === undefined) return undefined;
  if (hppd < band.min) return "Below Target";
  if (hppd > band.max) return "Above Target";
  return "Within Target";
}

export function classifySplit(
  cnaHPPD: number | undefined,
  nurseHPPD: number | undefined,
  band: SplitTargetBand,
): SplitBand | undefined {
  if (cnaHPPD === undefined || nurseHPPD === undefined) return undefined;
  const cnaOk = cnaHPPD >= band.cnaMin && cnaHPPD <= band.cnaMax;
  return cnaOk && nurseHPPD <= band.nurseMax ? "Good Split" : "Bad Split";
}

export interface RoleGroupHours {
  cna: number;
  nurse: number;
}

/**
 * CNA and RN+LPN hours on one side. Undefined when none of that side's hours
 * belong to either group, e.g. a report without a role column.
 */
export function roleGroupHours(roles: readonly RoleHours[], side: RecordSource): RoleGroupHours | undefined {
  let known = false;
  const totals: RoleGroupHours = { cna: 0, nurse: 0 };
  for (const role of roles) {
    const hours = side === "Template" ? role.templateHours : role.actualHours;
    if (hours === undefined) continue;
    if (CNA_ROLES.includes(role.role)) {
      totals.cna += hours;
      known = true;
    } else if (NURSE_ROLES.includes(role.role)) {
      totals.nurse += hours;
      known = true;
    }
  }
  return known ? totals : undefined;
}

interface SplitHppd {
  cna?: number;
  nurse?: number;
}

function splitHppd(roles: readonly RoleHours[], side: RecordSource, patientDays: number | undefined): SplitHppd {
  const groups = roleGroupHours(roles, side);
  if (!groups) return {};
  return { cna: computeHppd(groups.cna, patientDays), nurse: computeHppd(groups.nurse, patientDays) };
}

/**
 * Fills HPPD, variance, split HPPD and bands on each record. Variance is
 * actual minus template: positive means more hours per patient day than planned.
 */
export function calculateVariance(records: readonly ComparisonRecord[], options: VarianceOptions): ComparisonRecord[] {
  const splitBand = options.splitBand ?? DEFAULT_SPLIT_BAND;

  return records.map((record) => {
    const templateHPPD = computeHppd(record.templateHours, record.templatePatientDays);

    let actualPatientDays = record.actualPatientDays;
    let actualCensusFromTemplate = false;
    if (
      options.censusFallback === "template" &&
      record.status === "Matched" &&
      !((actualPatientDays ?? 0) > 0) &&
      (record.templatePatientDays ?? 0) > 0
    ) {
      actualPatientDays = record.templatePatientDays;
      actualCensusFromTemplate = true;
    }

    const actualHPPD = computeHppd(record.actualHours, actualPatientDays);
    const hppdVariance = record.status === "Matched" ? computeVariance(actualHPPD, templateHPPD) : undefined;

    const templateSplit: SplitHppd =
      record.status === "ActualOnly" ? {} : splitHppd(record.roles, "Template", record.templatePatientDays);
    const actualSplit: SplitHppd = record.status === "TemplateOnly" ? {} : splitHppd(record.roles, "Actual", actualPatientDays);

    return {
      ...record,
      actualPatientDays,
      actualCensusFromTemplate,
      templateHPPD,
      actualHPPD,
      hppdVariance,
      band: classifyHppd(actualHPPD, options.targetBand),
      templateCnaHPPD: templateSplit.cna,
      actualCnaHPPD: actualSplit.cna,
      templateNurseHPPD: templateSplit.nurse,
      actualNurseHPPD: actualSplit.nurse,
      splitBand: classifySplit(actualSplit.cna, actualSplit.nurse, splitBand),
    };
  });
}

interface SideAccumulator {
  hours: number;
  patientDays: number;
  keys: number;
  cnaHours: number;
  nurseHours: number;
  splitPatientDays: number;
  splitKeys: number;
}

interface Accumulator {
  template: SideAccumulator;
  actual: SideAccumulator;
  matchedKeys: number;
  unmatchedKeys: number;
  keysWithoutPatientDays: number;
}

function emptySide(): SideAccumulator {
  return { hours: 0, patientDays: 0, keys: 0, cnaHours: 0, nurseHours: 0, splitPatientDays: 0, splitKeys: 0 };
}

function emptyAccumulator(): Accumulator {
  return { template: emptySide(), actual: emptySide(), matchedKeys: 0, unmatchedKeys: 0, keysWithoutPatientDays: 0 };
}

/** Returns false when the side has no patient days and stays out of the totals. */
function accumulateSide(acc: SideAccumulator, record: ComparisonRecord, side: RecordSource): boolean {
  const hours = side === "Template" ? record.templateHours : record.actualHours;
  const patientDays = side === "Template" ? record.templatePatientDays : record.actualPatientDays;
  if (patientDays === undefined || !(patientDays > 0)) return false;

  acc.hours += hours ?? 0;
  acc.patientDays += patientDays;
  acc.keys++;

  const groups = roleGroupHours(record.roles, side);
  if (groups) {
    acc.cnaHours += groups.cna;
    acc.nurseHours += groups.nurse;
    acc.splitPatientDays += patientDays;
    acc.splitKeys++;
  }
  return true;
}

function accumulate(acc: Accumulator, record: ComparisonRecord): void {
  if (record.status !== "Matched") {
    acc.unmatchedKeys++;
    return;
  }
  acc.matchedKeys++;
  const templateIn = accumulateSide(acc.template, record, "Template");
  const actualIn = accumulateSide(acc.actual, record, "Actual");
  if (!templateIn || !actualIn) acc.keysWithoutPatientDays++;
}

interface SideFigures {
  hours?: number;
  patientDays?: number;
  hppd?: number;
  cna?: number;
  nurse?: number;
}

function sideFigures(side: SideAccumulator): SideFigures {
  if (side.keys === 0) return {};
  return {
    hours: side.hours,
    patientDays: side.patientDays,
    hppd: computeHppd(side.hours, side.patientDays),
    cna: side.splitKeys > 0 ? computeHppd(side.cnaHours, side.splitPatientDays) : undefined,
    nurse: side.splitKeys > 0 ? computeHppd(side.nurseHours, side.splitPatientDays) : undefined,
  };
}

function toRow(
  unit: string,
  shift: ShiftName,
  kind: SummaryRow["kind"],
  acc: Accumulator,
  band: HppdTargetBand,
  splitBand: SplitTargetBand,
): SummaryRow {
  const counts = {
    matchedKeys: acc.matchedKeys,
    unmatchedKeys: acc.unmatchedKeys,
    keysWithoutPatientDays: acc.keysWithoutPatientDays,
  };
  if (acc.matchedKeys === 0) return { unit, shift, kind, ...counts };

  const template = sideFigures(acc.template);
  const actual = sideFigures(acc.actual);
  return {
    unit,
    shift,
    kind,
    templateHours: template.hours,
    actualHours: actual.hours,
    templatePatientDays: template.patientDays,
    actualPatientDays: actual.patientDays,
    templateHPPD: template.hppd,
    actualHPPD: actual.hppd,
    hppdVariance: computeVariance(actual.hppd, template.hppd),
    band: classifyHppd(actual.hppd, band),
    templateCnaHPPD: template.cna,
    actualCnaHPPD: actual.cna,
    templateNurseHPPD: template.nurse,
    actualNurseHPPD: actual.nurse,
    splitBand: classifySplit(actual.cna, actual.nurse, splitBand),
    ...counts,
  };
}

/**
 * Per unit/shift totals, a subtotal per unit and a grand total. Only matched
 * keys feed the totals so both sides cover the same unit/shift/dates, and a
 * side's hours count only where that side has patient days.
 * Expects records already sorted by unit then shift.
 */
export function summarizeByUnitShift(
  records: readonly ComparisonRecord[],
  band: HppdTargetBand,
  splitBand: SplitTargetBand = DEFAULT_SPLIT_BAND,
): SummaryRow[] {
  const rows: SummaryRow[] = [];
  const grand = emptyAccumulator();

  let i = 0;
  while (i < records.length) {
    const unit = records[i].key.unit;
    const unitKey = unit.toLowerCase();
    const unitAcc = emptyAccumulator();
    const unitRows: SummaryRow[] = [];

    while (i < records.length && records[i].key.unit.toLowerCase() === unitKey) {
      const shift = records[i].key.shift;
      const shiftAcc = emptyAccumulator();
      while (i < records.length && records[i].key.unit.toLowerCase() === unitKey && records[i].key.shift === shift) {
        accumulate(shiftAcc, records[i]);
        accumulate(unitAcc, records[i]);
        accumulate(grand, records[i]);
        i++;
      }
      unitRows.push(toRow(unit, shift, "shift", shiftAcc, band, splitBand));
    }

    rows.push(...unitRows);
    if (unitRows.length > 1) rows.push(toRow(unit, ALL_SHIFTS, "unit", unitAcc, band, splitBand));
  }

  rows.push(toRow(ALL_UNITS, ALL_SHIFTS, "total", grand, band, splitBand));
  return rows;
}
