import type {
  ComparisonKey,
  ComparisonRecord,
  RecordSource,
  RoleHours,
  ShiftName,
  StaffRole,
  StaffingRecord,
} from "@hppd/shared";

interface SideTotals {
  hours: number;
  patientDays: number;
}

interface KeyGroup {
  key: ComparisonKey;
  template?: SideTotals;
  actual?: SideTotals;
  roles: Map<StaffRole, RoleHours>;
  notes: string[];
}

export function normalizeKeyPart(value: string): string {
  return value.replace(/\s+/g, " ").trim().toLowerCase();
}

export function comparisonKeyId(key: ComparisonKey): string {
  return [key.unit, key.shift, key.date].map(normalizeKeyPart).join("\u0000");
}

/**
 * Orders by unit (case-insensitive), then shift in the given order (unknown
 * shifts last, alphabetically), then date.
 */
export function compareComparisonKeys(shiftOrder: readonly ShiftName[]) {
  const rank = new Map(shiftOrder.map((s, i) => [normalizeKeyPart(s), i]));
  return (a: ComparisonKey, b: ComparisonKey): number => {
    const unitA = normalizeKeyPart(a.unit);
    const unitB = normalizeKeyPart(b.unit);
    if (unitA !== unitB) return unitA < unitB ? -1 : 1;

    const shiftA = normalizeKeyPart(a.shift);
    const shiftB = normalizeKeyPart(b.shift);
    if (shiftA !== shiftB) {
      const ra = rank.get(shiftA) ?? Number.MAX_SAFE_INTEGER;
      const rb = rank.get(shiftB) ?? Number.MAX_SAFE_INTEGER;
      if (ra !== rb) return ra - rb;
      return shiftA < shiftB ? -1 : 1;
    }

    if (a.date !== b.date) return a.date < b.date ? -1 : 1;
    return 0;
  };
}

export function sortComparisonRecords(records: ComparisonRecord[], shiftOrder: readonly ShiftName[]): ComparisonRecord[] {
  const compare = compareComparisonKeys(shiftOrder);
  return [...records].sort((a, b) => compare(a.key, b.key));
}

function addToGroup(groups: Map<string, KeyGroup>, record: StaffingRecord, side: RecordSource): void {
  const key: ComparisonKey = {
    unit: record.unit.replace(/\s+/g, " ").trim(),
    shift: record.shift,
    date: record.date,
  };
  const id = comparisonKeyId(key);

  let group = groups.get(id);
  if (!group) {
    group = { key, roles: new Map(), notes: [] };
    groups.set(id, group);
  }

  const totals = side === "Template" ? (group.template ??= { hours: 0, patientDays: 0 }) : (group.actual ??= { hours: 0, patientDays: 0 });
  totals.hours += record.hours;
  totals.patientDays += record.patientDays;

  let role = group.roles.get(record.role);
  if (!role) {
    role = { role: record.role };
    group.roles.set(record.role, role);
  }
  if (side === "Template") role.templateHours = (role.templateHours ?? 0) + record.hours;
  else role.actualHours = (role.actualHours ?? 0) + record.hours;

  if (record.note && !group.notes.includes(record.note)) group.notes.push(record.note);
}

/**
 * Pairs template and actual records by (unit, shift, date). Produces exactly
 * one record per key seen on either side; a side that contributed nothing
 * keeps its figures undefined.
 */
export function matchRecords(
  templateRecords: readonly StaffingRecord[],
  actualRecords: readonly StaffingRecord[],
  options: { shiftOrder: readonly ShiftName[]; roleOrder?: readonly StaffRole[] },
): ComparisonRecord[] {
  const groups = new Map<string, KeyGroup>();
  for (const r of templateRecords) addToGroup(groups, r, "Template");
  for (const r of actualRecords) addToGroup(groups, r, "Actual");

  const roleRank = new Map((options.roleOrder ?? []).map((r, i) => [r, i]));
  const byRole = (a: RoleHours, b: RoleHours): number => {
    const ra = roleRank.get(a.role) ?? Number.MAX_SAFE_INTEGER;
    const rb = roleRank.get(b.role) ?? Number.MAX_SAFE_INTEGER;
    if (ra !== rb) return ra - rb;
    return a.role < b.role ? -1 : a.role > b.role ? 1 : 0;
  };

  const records: ComparisonRecord[] = [];
  for (const group of groups.values()) {
    const status = group.template && group.actual ? "Matched" : group.template ? "TemplateOnly" : "ActualOnly";
    records.push({
      key: group.key,
      status,
      templateHours: group.template?.hours,
      actualHours: group.actual?.hours,
      templatePatientDays: group.template?.patientDays,
      actualPatientDays: group.actual?.patientDays,
      actualCensusFromTemplate: false,
      roles: [...group.roles.values()].sort(byRole),
      notes: group.notes,
    });
  }

  return sortComparisonRecords(records, options.shiftOrder);
}
