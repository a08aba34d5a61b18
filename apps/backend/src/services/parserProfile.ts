import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { ParserProfileSchema, type ColumnVariants, type ShiftName, type StaffRole } from "@hppd/shared";

const DEFAULT_PROFILE_PATH = fileURLToPath(new URL("../../config/parser-profile.json", import.meta.url));

/**
 * Folds a header or label cell to lower case with every run of
 * non-alphanumerics collapsed to one space: "Hrs." → "hrs", "7a-3p" → "7a 3p".
 */
export function normalizeLabel(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
}

/**
 * Site vocabulary for spreadsheet parsing: header variants, shift set and role set.
 * Loaded from JSON so new layouts are a configuration change.
 */
export class ParserProfile {
  readonly columns: ColumnVariants;
  readonly headerScanRows: number;
  readonly shiftOrder: ShiftName[];
  readonly roleOrder: StaffRole[];
  readonly otherRole: StaffRole;
  readonly unspecifiedRole: StaffRole;

  private readonly shiftAliases = new Map<string, ShiftName>();
  private readonly shiftHoursByName = new Map<ShiftName, number>();
  private readonly roleAliases = new Map<string, StaffRole>();
  private readonly unitCleanup: RegExp[];

  private constructor(raw: unknown) {
    const result = ParserProfileSchema.safeParse(raw);
    if (!result.success) {
      const details = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new Error(`Invalid parser profile: ${details}`);
    }
    const cfg = result.data;

    this.columns = cfg.columns;
    this.headerScanRows = cfg.headerScanRows;
    this.otherRole = cfg.otherRole;
    this.unspecifiedRole = cfg.unspecifiedRole;
    this.shiftOrder = cfg.shifts.map((s) => s.name);
    this.roleOrder = [...cfg.roles.map((r) => r.name), cfg.otherRole, cfg.unspecifiedRole];

    for (const shift of cfg.shifts) {
      this.shiftHoursByName.set(shift.name, shift.hours);
      for (const alias of [shift.name, ...shift.aliases]) {
        this.shiftAliases.set(normalizeLabel(alias), shift.name);
      }
    }
    for (const role of cfg.roles) {
      for (const alias of [role.name, ...role.aliases]) {
        this.roleAliases.set(normalizeLabel(alias), role.name);
      }
    }
    this.unitCleanup = cfg.unitCleanupPatterns.map((p) => new RegExp(p, "i"));
  }

  static fromConfig(raw: unknown): ParserProfile {
    return new ParserProfile(raw);
  }

  static load(path: string = DEFAULT_PROFILE_PATH): ParserProfile {
    const text = readFileSync(path, "utf8");
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e) {
      throw new Error(`Parser profile ${path} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    return new ParserProfile(raw);
  }

  resolveShift(label: unknown): ShiftName | undefined {
    const key = normalizeLabel(label);
    if (!key) return undefined;
    return this.shiftAliases.get(key);
  }

  shiftHours(shift: ShiftName): number | undefined {
    return this.shiftHoursByName.get(shift);
  }

  resolveRole(label: unknown): StaffRole {
    const key = normalizeLabel(label);
    if (!key) return this.unspecifiedRole;
    return this.roleAliases.get(key) ?? this.otherRole;
  }

  /**
   * Strips export decorations (payroll codes, report prefixes) and collapses whitespace.
   */
  cleanUnitLabel(raw: string): string {
    let label = raw.replace(/\s+/g, " ").trim();
    for (const pattern of this.unitCleanup) {
      label = label.replace(pattern, "").trim();
    }
    return label;
  }
}
