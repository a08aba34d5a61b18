import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import {
  DEFAULT_SPLIT_BAND,
  DEFAULT_TARGET_BAND,
  type HppdTargetBand,
  type SplitTargetBand,
} from "@hppd/shared";

export type CensusFallback = "none" | "template";

export interface AppConfig {
  port: number;
  corsOrigin: string;
  workDir: string;
  maxConcurrentJobs: number;
  retentionMs: number;
  maxUploadBytes: number;
  targetBand: HppdTargetBand;
  splitBand: SplitTargetBand;
  censusFallback: CensusFallback;
  parserProfilePath?: string;
  submitRateLimit: number;
}

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    CORS_ORIGIN: z.string().min(1).default("*"),
    HPPD_WORK_DIR: z.string().min(1).default(join(tmpdir(), "hppd-jobs")),
    HPPD_MAX_CONCURRENT_JOBS: z.coerce.number().int().min(1).max(32).default(2),
    HPPD_RETENTION_MINUTES: z.coerce.number().positive().default(60),
    HPPD_MAX_UPLOAD_MB: z.coerce.number().positive().max(1024).default(50),
    HPPD_TARGET_MIN: z.coerce.number().nonnegative().default(DEFAULT_TARGET_BAND.min),
    HPPD_TARGET_MAX: z.coerce.number().nonnegative().default(DEFAULT_TARGET_BAND.max),
    HPPD_SPLIT_CNA_MIN: z.coerce.number().nonnegative().default(DEFAULT_SPLIT_BAND.cnaMin),
    HPPD_SPLIT_CNA_MAX: z.coerce.number().nonnegative().default(DEFAULT_SPLIT_BAND.cnaMax),
    HPPD_SPLIT_NURSE_MAX: z.coerce.number().nonnegative().default(DEFAULT_SPLIT_BAND.nurseMax),
    // Actual reports usually carry hours only; "template" divides them by the planned census.
    HPPD_CENSUS_FALLBACK: z.enum(["none", "template"]).default("template"),
    HPPD_PARSER_PROFILE: z.string().min(1).optional(),
    HPPD_SUBMIT_RATE_LIMIT: z.coerce.number().int().positive().default(30),
  })
  .refine((env) => env.HPPD_TARGET_MIN <= env.HPPD_TARGET_MAX, {
    message: "HPPD_TARGET_MIN must not exceed HPPD_TARGET_MAX",
    path: ["HPPD_TARGET_MIN"],
  })
  .refine((env) => env.HPPD_SPLIT_CNA_MIN <= env.HPPD_SPLIT_CNA_MAX, {
    message: "HPPD_SPLIT_CNA_MIN must not exceed HPPD_SPLIT_CNA_MAX",
    path: ["HPPD_SPLIT_CNA_MIN"],
  });

/**
 * Reads and validates the service configuration. Blank variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value.trim();
  }

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = result.data;
  return {
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
    workDir: e.HPPD_WORK_DIR,
    maxConcurrentJobs: e.HPPD_MAX_CONCURRENT_JOBS,
    retentionMs: e.HPPD_RETENTION_MINUTES * 60 * 1000,
    maxUploadBytes: Math.round(e.HPPD_MAX_UPLOAD_MB * 1024 * 1024),
    targetBand: { min: e.HPPD_TARGET_MIN, max: e.HPPD_TARGET_MAX },
    splitBand: { cnaMin: e.HPPD_SPLIT_CNA_MIN, cnaMax: e.HPPD_SPLIT_CNA_MAX, nurseMax: e.HPPD_SPLIT_NURSE_MAX },
    censusFallback: e.HPPD_CENSUS_FALLBACK,
    parserProfilePath: e.HPPD_PARSER_PROFILE,
    submitRateLimit: e.HPPD_SUBMIT_RATE_LIMIT,
  };
}
