import type { JobState, StaffRole } from "../types";

export const SUPPORTED_SPREADSHEET_EXTENSIONS = [".xlsx", ".xlsm", ".xls", ".csv"] as const;

export const NOT_AVAILABLE = "N/A";

export const TERMINAL_JOB_STATES: ReadonlySet<JobState> = new Set<JobState>(["Completed", "Failed"]);

// Progress checkpoints (percent)
export const PROGRESS = {
  QUEUED: 0,
  EXTRACTED: 10,
  TEMPLATES_PARSED: 25,
  ACTUALS_PARSED: 40,
  MATCHED: 55,
  CALCULATED: 70,
  WRITING: 85,
  DONE: 100,
} as const;

export const DEFAULT_TARGET_BAND = { min: 3.0, max: 3.3 } as const;

export const DEFAULT_SPLIT_BAND = { cnaMin: 2.0, cnaMax: 2.06, nurseMax: 1.2 } as const;

// Role groups behind the split HPPD columns
export const CNA_ROLES: readonly StaffRole[] = ["CNA"];
export const NURSE_ROLES: readonly StaffRole[] = ["RN", "LPN"];

export const REPORT_SHEETS = {
  SUMMARY: "Summary",
  DETAIL: "Detail",
  EXCEPTIONS: "Exceptions",
} as const;
