import { z } from "zod";

// Helper Regex
export const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
export const JOB_ID_REGEX = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/;

/**
 * Builds a YYYY-MM-DD string, or null when the parts are not a real calendar day.
 */
export function toIsoDate(year: number, month: number, day: number): string | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return null;
  if (year < 1900 || year > 9999) return null;
  const candidate = new Date(Date.UTC(year, month - 1, day));
  if (
    candidate.getUTCFullYear() !== year ||
    candidate.getUTCMonth() !== month - 1 ||
    candidate.getUTCDate() !== day
  ) {
    return null;
  }
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

export function isCalendarDate(value: string): boolean {
  if (!DATE_REGEX.test(value)) return false;
  const [y, m, d] = value.split("-").map(Number);
  return toIsoDate(y, m, d) === value;
}

// --- Submission Schema ---
export const SubmissionFieldsSchema = z.object({
  jobId: z
    .string({ required_error: "Job identifier is required" })
    .trim()
    .regex(JOB_ID_REGEX, "Job identifier must be 1-64 letters, digits, '-' or '_'"),
  targetDate: z
    .string({ required_error: "Target date is required" })
    .trim()
    .refine(isCalendarDate, "Target date must be a real date in YYYY-MM-DD format"),
});

export type SubmissionFields = z.infer<typeof SubmissionFieldsSchema>;

// --- Parser Profile Schema ---
const aliasList = z.array(z.string().min(1)).default([]);

export const ColumnVariantsSchema = z.object({
  unit: z.array(z.string().min(1)).min(1),
  shift: z.array(z.string().min(1)).min(1),
  date: z.array(z.string().min(1)).min(1),
  hours: z.array(z.string().min(1)).min(1),
  role: aliasList,
  patientDays: aliasList,
  census: aliasList,
  note: aliasList,
});

export type ColumnVariants = z.infer<typeof ColumnVariantsSchema>;

export const ParserProfileSchema = z
  .object({
    headerScanRows: z.number().int().positive().max(500).default(30),
    columns: ColumnVariantsSchema,
    shifts: z
      .array(
        z.object({
          name: z.string().min(1),
          hours: z.number().positive().max(24),
          aliases: aliasList,
        }),
      )
      .min(1, "At least one shift must be defined"),
    roles: z.array(
      z.object({
        name: z.string().min(1),
        aliases: aliasList,
      }),
    ),
    otherRole: z.string().min(1).default("Other"),
    unspecifiedRole: z.string().min(1).default("Unspecified"),
    unitCleanupPatterns: z.array(z.string().min(1)).default([]),
  })
  .superRefine((data, ctx) => {
    const names = new Set<string>();
    data.shifts.forEach((shift, idx) => {
      const key = shift.name.toLowerCase();
      if (names.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate shift name '${shift.name}'`,
          path: ["shifts", idx, "name"],
        });
      }
      names.add(key);
    });

    data.unitCleanupPatterns.forEach((pattern, idx) => {
      try {
        new RegExp(pattern, "i");
      } catch (e) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Invalid unit cleanup pattern: ${e instanceof Error ? e.message : String(e)}`,
          path: ["unitCleanupPatterns", idx],
        });
      }
    });
  });

export type ParserProfileConfig = z.infer<typeof ParserProfileSchema>;
