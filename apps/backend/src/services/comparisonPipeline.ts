import { basename } from "node:path";
import {
  DEFAULT_SPLIT_BAND,
  PROGRESS,
  type ComparisonRecord,
  type JobSummary,
  type ProcessingWarning,
  type RecordSource,
  type StaffingRecord,
} from "@hppd/shared";
import { NoUsableDataError } from "../errors";
import type { ExtractedFile } from "./archiveExtractor";
import { matchRecords } from "./matcher";
import type { ParserProfile } from "./parserProfile";
import type { RecordParser } from "./recordParser";
import type { ReportWriter } from "./reportWriter";
import { calculateVariance, type VarianceOptions } from "./varianceCalculator";

export interface PipelineInput {
  jobId: string;
  targetDate: string;
  templateFiles: readonly ExtractedFile[];
  actualFiles: readonly ExtractedFile[];
  extractionWarnings: readonly ProcessingWarning[];
  outputDir: string;
}

export interface PipelineResult {
  resultPath: string;
  resultFileName: string;
  records: ComparisonRecord[];
  summary: JobSummary;
}

export type ProgressReporter = (percent: number, statusMessage: string) => Promise<void>;

/** Anything that can turn extracted archives into a finished report. */
export interface ComparisonRunner {
  run(input: PipelineInput, report: ProgressReporter): Promise<PipelineResult>;
}

interface SideResult {
  records: StaffingRecord[];
  rowsOutsideDate: number;
}

const yieldToEventLoop = () => new Promise<void>((resolve) => setImmediate(resolve));

export class ComparisonPipeline implements ComparisonRunner {
  constructor(
    private readonly deps: {
      parser: RecordParser;
      writer: ReportWriter;
      profile: ParserProfile;
      variance: VarianceOptions;
      now?: () => Date;
    },
  ) {}

  async run(input: PipelineInput, report: ProgressReporter): Promise<PipelineResult> {
    const warnings: ProcessingWarning[] = [...input.extractionWarnings];

    await report(
      PROGRESS.EXTRACTED,
      `Archives unpacked: ${input.templateFiles.length} template and ${input.actualFiles.length} actual spreadsheet(s)`,
    );

    const template = await this.parseSide(input, "Template", input.templateFiles, warnings, report, PROGRESS.EXTRACTED, PROGRESS.TEMPLATES_PARSED);
    const actual = await this.parseSide(input, "Actual", input.actualFiles, warnings, report, PROGRESS.TEMPLATES_PARSED, PROGRESS.ACTUALS_PARSED);

    if (template.records.length === 0) {
      throw new NoUsableDataError(`No template staffing rows for ${input.targetDate} were found in the uploaded templates`);
    }
    if (actual.records.length === 0) {
      throw new NoUsableDataError(`No actual staffing rows for ${input.targetDate} were found in the uploaded reports`);
    }

    await report(PROGRESS.MATCHED, "Matching template and actual staffing by unit, shift and date");
    const matched = matchRecords(template.records, actual.records, {
      shiftOrder: this.deps.profile.shiftOrder,
      roleOrder: this.deps.profile.roleOrder,
    });
    await yieldToEventLoop();

    await report(PROGRESS.CALCULATED, "Calculating HPPD variance");
    const records = calculateVariance(matched, this.deps.variance);
    await yieldToEventLoop();

    await report(PROGRESS.WRITING, "Writing comparison workbook");
    const resultPath = await this.deps.writer.write(
      records,
      {
        jobId: input.jobId,
        targetDate: input.targetDate,
        generatedAt: this.deps.now?.() ?? new Date(),
        templateFiles: input.templateFiles.length,
        actualFiles: input.actualFiles.length,
        warnings,
        targetBand: this.deps.variance.targetBand,
        splitBand: this.deps.variance.splitBand ?? DEFAULT_SPLIT_BAND,
      },
      input.outputDir,
    );

    const skippedRows = warnings.filter((w) => w.category === "Invalid Row").length;
    if (warnings.length > 0) {
      console.warn(`[Job] ${input.jobId}: ${warnings.length} warning(s), ${skippedRows} row(s) skipped`);
    }

    return {
      resultPath,
      resultFileName: basename(resultPath),
      records,
      summary: {
        templateFiles: input.templateFiles.length,
        actualFiles: input.actualFiles.length,
        templateRecords: template.records.length,
        actualRecords: actual.records.length,
        rowsOutsideDate: template.rowsOutsideDate + actual.rowsOutsideDate,
        matched: records.filter((r) => r.status === "Matched").length,
        templateOnly: records.filter((r) => r.status === "TemplateOnly").length,
        actualOnly: records.filter((r) => r.status === "ActualOnly").length,
        warnings: warnings.length,
      },
    };
  }

  private async parseSide(
    input: PipelineInput,
    source: RecordSource,
    files: readonly ExtractedFile[],
    warnings: ProcessingWarning[],
    report: ProgressReporter,
    fromPercent: number,
    toPercent: number,
  ): Promise<SideResult> {
    const side: SideResult = { records: [], rowsOutsideDate: 0 };
    const noun = source === "Template" ? "template" : "actual report";

    for (let i = 0; i < files.length; i++) {
      const result = this.deps.parser.parseFile(files[i], { source, targetDate: input.targetDate });
      side.records.push(...result.records);
      side.rowsOutsideDate += result.rowsOutsideDate;
      warnings.push(...result.warnings);

      const percent = Math.round(fromPercent + ((toPercent - fromPercent) * (i + 1)) / files.length);
      await report(percent, `Reading ${noun} spreadsheets (${i + 1}/${files.length})`);
      // Parsing is synchronous; give pollers a turn between files.
      await yieldToEventLoop();
    }

    console.log(
      `[Parser] ${input.jobId}: ${side.records.length} ${noun} row(s) for ${input.targetDate}, ${side.rowsOutsideDate} outside the date`,
    );
    return side;
  }
}
