import JSZip from "jszip";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { v4 as uuidv4 } from "uuid";
import * as XLSX from "xlsx";
import { DEFAULT_SPLIT_BAND, DEFAULT_TARGET_BAND } from "@hppd/shared";
import { ComparisonPipeline } from "../src/services/comparisonPipeline";
import { JobManager } from "../src/services/jobManager";
import { InMemoryJobStore } from "../src/services/jobStore";
import { ParserProfile } from "../src/services/parserProfile";
import { RecordParser } from "../src/services/recordParser";
import { ReportWriter } from "../src/services/reportWriter";

const TARGET_DATE = "2024-01-10";

function workbookBuffer(rows: unknown[][]): Buffer {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(rows), "Staffing");
  return XLSX.write(wb, { type: "buffer", bookType: "xlsx" });
}

async function zipOf(files: Record<string, Buffer | string>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(files)) zip.file(name, content);
  return zip.generateAsync({ type: "nodebuffer" });
}

async function main() {
  console.log("Starting HPPD comparison run...");

  // Mock labor template (one workbook) and timekeeping export (csv)
  const templates = await zipOf({
    "labor_template.xlsx": workbookBuffer([
      ["Daily Labor Template"],
      [],
      ["Unit", "Shift", "Date", "Role", "Hours", "Patient Days"],
      ["ICU", "Day", TARGET_DATE, "RN", 36, 12],
      ["ICU", "Day", TARGET_DATE, "CNA", 12, 0],
      ["ICU", "Night", TARGET_DATE, "RN", 24, 12],
      ["Med Surg", "Day", TARGET_DATE, "RN", 40, 20],
    ]),
  });
  const reports = await zipOf({
    "actuals.csv": [
      "Department,Shift Name,Work Date,Job Title,Hours Worked,PPD",
      `ICU,D,${TARGET_DATE},Registered Nurse,40,12`,
      `ICU,D,${TARGET_DATE},Nurse Aide,14,0`,
      `ICU,NOC,${TARGET_DATE},RN,22,12`,
      `ER,Nights,${TARGET_DATE},RN,30,10`,
    ].join("\n"),
  });

  const profile = ParserProfile.load();
  const manager = new JobManager({
    store: new InMemoryJobStore(),
    runner: new ComparisonPipeline({
      parser: new RecordParser(profile),
      writer: new ReportWriter({ shiftOrder: profile.shiftOrder, roleOrder: profile.roleOrder }),
      profile,
      variance: { censusFallback: "template", targetBand: DEFAULT_TARGET_BAND, splitBand: DEFAULT_SPLIT_BAND },
    }),
    workDir: join(tmpdir(), "hppd-manual-run"),
    maxConcurrentJobs: 1,
    retentionMs: 60 * 60 * 1000,
  });

  const jobId = uuidv4();
  await manager.submit({ jobId, targetDate: TARGET_DATE, templateArchive: templates, actualArchive: reports });
  console.log("Submitted job:", jobId);

  let progress = await manager.getProgress(jobId);
  while (!progress.completed) {
    console.log(`  ${progress.percent}% ${progress.statusMessage}`);
    await new Promise((resolve) => setTimeout(resolve, 50));
    progress = await manager.getProgress(jobId);
  }

  if (!progress.artifactAvailable) {
    throw new Error(`Comparison failed: ${progress.error ?? "unknown error"}`);
  }

  const job = await manager.getJob(jobId);
  console.log("Summary:", progress.summary);
  console.log("Workbook written to:", job.resultPath);
}

main().catch((e) => {
  console.error("Comparison run failed:", e);
  process.exit(1);
});
