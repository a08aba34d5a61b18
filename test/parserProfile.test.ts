import { describe, expect, it } from "vitest";
import { ParserProfile, normalizeLabel } from "../apps/backend/src/services/parserProfile";
import { loadProfile } from "./helpers/workbookFixtures";

const profile = loadProfile();

describe("normalizeLabel", () => {
  it("folds case and punctuation", () => {
    expect(normalizeLabel("Hrs.")).toBe("hrs");
    expect(normalizeLabel("7a-3p")).toBe("7a 3p");
    expect(normalizeLabel("  Patient   Days ")).toBe("patient days");
    expect(normalizeLabel(null)).toBe("");
  });
});

describe("ParserProfile (bundled)", () => {
  it("orders shifts and roles as configured", () => {
    expect(profile.shiftOrder).toEqual(["Day", "Evening", "Night"]);
    expect(profile.roleOrder).toEqual(["RN", "LPN", "CNA", "Other", "Unspecified"]);
    expect(profile.headerScanRows).toBe(30);
    expect(profile.shiftHours("Night")).toBe(8);
  });

  it.each([
    ["Day", "Day"],
    ["D", "Day"],
    ["7a-3p", "Day"],
    ["PM", "Evening"],
    ["3p - 11p", "Evening"],
    ["NOC", "Night"],
    ["Nights", "Night"],
  ])("resolves shift label %s", (label, expected) => {
    expect(profile.resolveShift(label)).toBe(expected);
  });

  it("leaves unknown shift labels unresolved", () => {
    expect(profile.resolveShift("Swing")).toBeUndefined();
    expect(profile.resolveShift("")).toBeUndefined();
  });

  it("maps roles with Other and Unspecified sentinels", () => {
    expect(profile.resolveRole("Registered Nurse")).toBe("RN");
    expect(profile.resolveRole("lvn")).toBe("LPN");
    expect(profile.resolveRole("STNA")).toBe("CNA");
    expect(profile.resolveRole("Unit Clerk")).toBe("Other");
    expect(profile.resolveRole("")).toBe("Unspecified");
    expect(profile.resolveRole(undefined)).toBe("Unspecified");
  });

  it("strips timekeeping decorations from unit labels", () => {
    expect(profile.cleanUnitLabel("Total Nursing Wrkd - ICU PA12_3")).toBe("ICU");
    expect(profile.cleanUnitLabel("  Med   Surg ")).toBe("Med Surg");
  });
});

describe("ParserProfile.fromConfig", () => {
  const minimal = {
    columns: { unit: ["unit"], shift: ["shift"], date: ["date"], hours: ["hours"] },
    shifts: [{ name: "Day", hours: 12, aliases: ["days"] }],
    roles: [],
  };

  it("fills defaults", () => {
    const custom = ParserProfile.fromConfig(minimal);
    expect(custom.headerScanRows).toBe(30);
    expect(custom.roleOrder).toEqual(["Other", "Unspecified"]);
    expect(custom.shiftHours("Day")).toBe(12);
    expect(custom.columns.census).toEqual([]);
  });

  it("rejects duplicate shift names", () => {
    expect(() =>
      ParserProfile.fromConfig({
        ...minimal,
        shifts: [
          { name: "Day", hours: 12 },
          { name: "day", hours: 8 },
        ],
      }),
    ).toThrow("Invalid parser profile: shifts.1.name: Duplicate shift name 'day'");
  });

  it("rejects a profile without required column variants", () => {
    expect(() => ParserProfile.fromConfig({ ...minimal, columns: { unit: ["unit"] } })).toThrow(/Invalid parser profile/);
  });

  it("rejects broken cleanup patterns", () => {
    expect(() => ParserProfile.fromConfig({ ...minimal, unitCleanupPatterns: ["("] })).toThrow(
      /Invalid unit cleanup pattern/,
    );
  });
});
