import type { ColumnVariants } from "@hppd/shared";
import { normalizeLabel } from "./parserProfile";

export type ColumnField = keyof ColumnVariants;

export const REQUIRED_COLUMNS: readonly ColumnField[] = ["unit", "shift", "date", "hours"];
const OPTIONAL_COLUMNS: readonly ColumnField[] = ["role", "patientDays", "census", "note"];

export type ColumnIndexes = { [F in ColumnField]?: number };

export interface ResolvedColumns {
  headerRow: number;
  columns: ColumnIndexes;
}

export type ResolveOutcome =
  | { ok: true; resolved: ResolvedColumns }
  | { ok: false; missing: ColumnField[] };

/**
 * Finds the header row of a sheet by matching cells against known header
 * variants instead of assuming fixed offsets.
 */
export class ColumnResolver {
  private readonly variants: Map<ColumnField, Set<string>>;

  constructor(
    variants: ColumnVariants,
    private readonly scanRows: number = 30,
  ) {
    this.variants = new Map();
    for (const field of [...REQUIRED_COLUMNS, ...OPTIONAL_COLUMNS]) {
      this.variants.set(field, new Set(variants[field].map(normalizeLabel).filter((v) => v !== "")));
    }
  }

  resolve(rows: readonly (readonly unknown[])[]): ResolveOutcome {
    let bestMissing: ColumnField[] = [...REQUIRED_COLUMNS];
    const limit = Math.min(rows.length, this.scanRows);

    for (let r = 0; r < limit; r++) {
      const columns = this.matchRow(rows[r]);
      const missing = REQUIRED_COLUMNS.filter((f) => columns[f] === undefined);
      if (missing.length === 0) {
        return { ok: true, resolved: { headerRow: r, columns } };
      }
      if (missing.length < bestMissing.length) bestMissing = missing;
    }

    return { ok: false, missing: bestMissing };
  }

  private matchRow(row: readonly unknown[]): ColumnIndexes {
    const columns: ColumnIndexes = {};
    const claimed = new Set<number>();
    const cells = row.map(normalizeLabel);

    // Required fields claim first so an optional variant never steals their column.
    for (const field of [...REQUIRED_COLUMNS, ...OPTIONAL_COLUMNS]) {
      const known = this.variants.get(field);
      if (!known || known.size === 0) continue;
      const idx = cells.findIndex((cell, i) => cell !== "" && !claimed.has(i) && known.has(cell));
      if (idx !== -1) {
        columns[field] = idx;
        claimed.add(idx);
      }
    }
    return columns;
  }
}
