// 統一管理 HPPD 比對流程共用的型別

export type RecordSource = "Template" | "Actual";

// Canonical names come from the parser profile; Day/Evening/Night is the bundled set.
export type ShiftName = "Day" | "Evening" | "Night" | string;
export type StaffRole = "RN" | "LPN" | "CNA" | "Other" | "Unspecified" | string;

export interface RecordOrigin {
  file: string;
  sheet: string;
  row: number;
}

export interface StaffingRecord {
  unit: string;
  shift: ShiftName;
  date: string; // YYYY-MM-DD
  role: StaffRole;
  hours: number;
  patientDays: number;
  source: RecordSource;
  note?: string;
  origin: RecordOrigin;
}

export interface ComparisonKey {
  unit: string;
  shift: ShiftName;
  date: string;
}

export type ComparisonStatus = "Matched" | "TemplateOnly" | "ActualOnly";

export type HppdBand = "Below Target" | "Within Target" | "Above Target";

export type SplitBand = "Good Split" | "Bad Split";

export interface RoleHours {
  role: StaffRole;
  templateHours?: number;
  actualHours?: number;
}

export interface ComparisonRecord {
  key: ComparisonKey;
  status: ComparisonStatus;
  templateHours?: number;
  actualHours?: number;
  templatePatientDays?: number;
  actualPatientDays?: number;
  templateHPPD?: number;
  actualHPPD?: number;
  hppdVariance?: number;
  band?: HppdBand;
  // CNA and RN+LPN hours over the same patient days as the total HPPD
  templateCnaHPPD?: number;
  actualCnaHPPD?: number;
  templateNurseHPPD?: number;
  actualNurseHPPD?: number;
  splitBand?: SplitBand;
  actualCensusFromTemplate: boolean;
  roles: RoleHours[];
  notes: string[];
}

export type WarningCategory =
  | "Hidden File"
  | "Unsupported Format"
  | "Unreadable File"
  | "Malformed Sheet"
  | "Invalid Row";

export interface ProcessingWarning {
  source: RecordSource;
  file: string;
  sheet?: string;
  row?: number;
  category: WarningCategory;
  message: string;
}

export type JobState = "Pending" | "Running" | "Completed" | "Failed";

export interface JobSummary {
  templateFiles: number;
  actualFiles: number;
  templateRecords: number;
  actualRecords: number;
  rowsOutsideDate: number;
  matched: number;
  templateOnly: number;
  actualOnly: number;
  warnings: number;
}

export interface Job {
  id: string;
  state: JobState;
  percent: number;
  statusMessage: string;
  targetDate: string;
  createdAt: string;
  updatedAt: string;
  finishedAt?: string;
  resultPath?: string;
  resultFileName?: string;
  error?: string;
  errorCode?: string;
  summary?: JobSummary;
}

export interface JobProgress {
  jobId: string;
  state: JobState;
  percent: number;
  statusMessage: string;
  completed: boolean;
  artifactAvailable: boolean;
  error?: string;
  summary?: JobSummary;
}

export interface HppdTargetBand {
  min: number;
  max: number;
}

/** Good split: CNA HPPD within [cnaMin, cnaMax] and RN+LPN HPPD at most nurseMax. */
export interface SplitTargetBand {
  cnaMin: number;
  cnaMax: number;
  nurseMax: number;
}
