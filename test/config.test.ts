import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../apps/backend/src/config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      corsOrigin: "*",
      workDir: join(tmpdir(), "hppd-jobs"),
      maxConcurrentJobs: 2,
      retentionMs: 60 * 60 * 1000,
      maxUploadBytes: 50 * 1024 * 1024,
      targetBand: { min: 3.0, max: 3.3 },
      splitBand: { cnaMin: 2.0, cnaMax: 2.06, nurseMax: 1.2 },
      censusFallback: "template",
      parserProfilePath: undefined,
      submitRateLimit: 30,
    });
  });

  it("reads overrides and treats blank values as unset", () => {
    const config = loadConfig({
      PORT: "8080",
      HPPD_RETENTION_MINUTES: "5",
      HPPD_CENSUS_FALLBACK: "none",
      HPPD_SPLIT_NURSE_MAX: "1.5",
      HPPD_TARGET_MIN: " 2.5 ",
      HPPD_WORK_DIR: "  ",
      HPPD_PARSER_PROFILE: "/etc/hppd/profile.json",
    });

    expect(config.port).toBe(8080);
    expect(config.retentionMs).toBe(5 * 60 * 1000);
    expect(config.censusFallback).toBe("none");
    expect(config.splitBand).toEqual({ cnaMin: 2.0, cnaMax: 2.06, nurseMax: 1.5 });
    expect(config.targetBand).toEqual({ min: 2.5, max: 3.3 });
    expect(config.workDir).toBe(join(tmpdir(), "hppd-jobs"));
    expect(config.parserProfilePath).toBe("/etc/hppd/profile.json");
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ HPPD_MAX_CONCURRENT_JOBS: "0" })).toThrow(/^Invalid configuration: HPPD_MAX_CONCURRENT_JOBS: /);
    expect(() => loadConfig({ HPPD_CENSUS_FALLBACK: "actual" })).toThrow(/HPPD_CENSUS_FALLBACK/);
  });

  it("rejects a target band whose minimum exceeds its maximum", () => {
    expect(() => loadConfig({ HPPD_TARGET_MIN: "4" })).toThrow(
      "Invalid configuration: HPPD_TARGET_MIN: HPPD_TARGET_MIN must not exceed HPPD_TARGET_MAX",
    );
  });

  it("rejects a split band whose CNA minimum exceeds its maximum", () => {
    expect(() => loadConfig({ HPPD_SPLIT_CNA_MIN: "2.5" })).toThrow(
      "Invalid configuration: HPPD_SPLIT_CNA_MIN: HPPD_SPLIT_CNA_MIN must not exceed HPPD_SPLIT_CNA_MAX",
    );
  });
});
