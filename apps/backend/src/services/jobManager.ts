import { readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import {
  PROGRESS,
  SubmissionFieldsSchema,
  TERMINAL_JOB_STATES,
  type Job,
  type JobProgress,
  type JobState,
} from "@hppd/shared";
import {
  DuplicateJobError,
  HppdError,
  InternalFailureError,
  NotFoundError,
  NotReadyError,
  ValidationError,
  describeError,
} from "../errors";
import { ArchiveExtractor, DEFAULT_EXTRACTION_LIMITS, type ExtractionLimits } from "./archiveExtractor";
import type { ComparisonRunner, PipelineInput } from "./comparisonPipeline";
import type { JobStore } from "./jobStore";

export interface SubmissionInput {
  jobId?: string;
  targetDate?: string;
  templateArchive?: Buffer;
  actualArchive?: Buffer;
}

export interface JobManagerOptions {
  store: JobStore;
  runner: ComparisonRunner;
  workDir: string;
  maxConcurrentJobs: number;
  retentionMs: number;
  sweepIntervalMs?: number;
  extractionLimits?: ExtractionLimits;
  now?: () => Date;
}

export interface Artifact {
  fileName: string;
  data: Buffer;
}

export interface JobManagerStats {
  queued: number;
  running: number;
  jobs: Record<JobState, number>;
}

type JobPatch = Partial<Omit<Job, "id" | "createdAt">>;

interface QueuedJob {
  id: string;
  input: PipelineInput;
}

/**
 * Owns comparison jobs end to end: validates and unpacks submissions, runs
 * them on a bounded queue, records progress and serves the finished workbook
 * until the retention window closes.
 */
export class JobManager {
  private readonly queue: QueuedJob[] = [];
  private readonly running = new Set<string>();
  private idleWaiters: Array<() => void> = [];
  private sweepTimer?: NodeJS.Timeout;

  constructor(private readonly options: JobManagerOptions) {}

  async submit(input: SubmissionInput): Promise<Job> {
    const { jobId, targetDate, templateArchive, actualArchive } = this.validate(input);
    const { store } = this.options;

    if (await store.get(jobId)) throw new DuplicateJobError(jobId);

    // Archives are unpacked before the job exists so a bad upload never lands in the registry.
    const limits = this.options.extractionLimits ?? DEFAULT_EXTRACTION_LIMITS;
    const templates = await ArchiveExtractor.extract(templateArchive, "Template", limits);
    const actuals = await ArchiveExtractor.extract(actualArchive, "Actual", limits);

    const timestamp = this.timestamp();
    const job = await store.create({
      id: jobId,
      state: "Pending",
      percent: PROGRESS.QUEUED,
      statusMessage: "Waiting for a free worker",
      targetDate,
      createdAt: timestamp,
      updatedAt: timestamp,
    });

    this.queue.push({
      id: jobId,
      input: {
        jobId,
        targetDate,
        templateFiles: templates.files,
        actualFiles: actuals.files,
        extractionWarnings: [...templates.warnings, ...actuals.warnings],
        outputDir: this.jobDir(jobId),
      },
    });
    console.log(
      `[Job] ${jobId}: accepted for ${targetDate} (${templates.files.length} template, ${actuals.files.length} actual file(s))`,
    );
    this.drain();
    return job;
  }

  async getJob(jobId: string): Promise<Job> {
    const job = await this.options.store.get(jobId);
    if (!job) throw new NotFoundError(jobId);
    if (this.isExpired(job)) {
      await this.purge(job);
      throw new NotFoundError(jobId);
    }
    return job;
  }

  async getProgress(jobId: string): Promise<JobProgress> {
    const job = await this.getJob(jobId);
    return {
      jobId: job.id,
      state: job.state,
      percent: job.percent,
      statusMessage: job.statusMessage,
      completed: TERMINAL_JOB_STATES.has(job.state),
      artifactAvailable: job.state === "Completed",
      error: job.error,
      summary: job.summary,
    };
  }

  /** Reads the finished workbook. Repeat calls return the same file's bytes. */
  async fetchArtifact(jobId: string): Promise<Artifact> {
    const job = await this.getJob(jobId);
    if (job.state !== "Completed" || !job.resultPath || !job.resultFileName) {
      throw new NotReadyError(
        job.state === "Failed"
          ? `Job '${jobId}' failed and has no workbook: ${job.error ?? "unknown error"}`
          : `Job '${jobId}' is ${job.state.toLowerCase()} (${job.percent}%); the workbook is not ready yet`,
      );
    }

    try {
      return { fileName: job.resultFileName, data: await readFile(job.resultPath) };
    } catch (err) {
      throw new InternalFailureError(`Workbook for job '${jobId}' could not be read`, { cause: err });
    }
  }

  async discard(jobId: string): Promise<void> {
    const job = await this.getJob(jobId);
    if (!TERMINAL_JOB_STATES.has(job.state)) {
      throw new NotReadyError(`Job '${jobId}' is still ${job.state.toLowerCase()} and cannot be discarded`);
    }
    await this.purge(job);
  }

  /** Removes finished jobs past the retention window. Returns how many were purged. */
  async purgeExpired(): Promise<number> {
    const expired = (await this.options.store.list()).filter((job) => this.isExpired(job));
    for (const job of expired) {
      await this.purge(job);
    }
    return expired.length;
  }

  start(): void {
    if (this.sweepTimer) return;
    const interval = this.options.sweepIntervalMs ?? Math.min(60_000, this.options.retentionMs);
    this.sweepTimer = setInterval(() => {
      this.purgeExpired().catch((err) => {
        console.error(`[Job] Retention sweep failed: ${describeError(err)}`);
      });
    }, interval);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = undefined;
  }

  /** Resolves once nothing is queued or running. */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  async stats(): Promise<JobManagerStats> {
    const jobs: Record<JobState, number> = { Pending: 0, Running: 0, Completed: 0, Failed: 0 };
    for (const job of await this.options.store.list()) jobs[job.state]++;
    return { queued: this.queue.length, running: this.running.size, jobs };
  }

  private validate(input: SubmissionInput): {
    jobId: string;
    targetDate: string;
    templateArchive: Buffer;
    actualArchive: Buffer;
  } {
    const issues: string[] = [];
    const fields = SubmissionFieldsSchema.safeParse({ jobId: input.jobId, targetDate: input.targetDate });
    if (!fields.success) issues.push(...fields.error.issues.map((i) => i.message));

    const { templateArchive, actualArchive } = input;
    if (!templateArchive || templateArchive.length === 0) issues.push("Template archive is required");
    if (!actualArchive || actualArchive.length === 0) issues.push("Actual report archive is required");

    if (!fields.success || !templateArchive || !actualArchive || issues.length > 0) {
      throw new ValidationError(issues);
    }
    return { ...fields.data, templateArchive, actualArchive };
  }

  private drain(): void {
    while (this.running.size < this.options.maxConcurrentJobs) {
      const task = this.queue.shift();
      if (!task) break;
      this.running.add(task.id);
      // execute() records every failure on the job and never rejects.
      void this.execute(task).finally(() => {
        this.running.delete(task.id);
        this.drain();
        this.notifyIfIdle();
      });
    }
  }

  private async execute(task: QueuedJob): Promise<void> {
    const { id } = task;
    try {
      await this.transition(id, { state: "Running", statusMessage: "Starting comparison" });
      console.log(`[Job] ${id}: running`);

      const result = await this.options.runner.run(task.input, async (percent, statusMessage) => {
        await this.transition(id, { percent, statusMessage });
      });

      await this.transition(id, {
        state: "Completed",
        percent: PROGRESS.DONE,
        statusMessage: "Comparison ready for download",
        resultPath: result.resultPath,
        resultFileName: result.resultFileName,
        summary: result.summary,
        finishedAt: this.timestamp(),
      });
      console.log(
        `[Job] ${id}: completed (${result.summary.matched} matched, ${result.summary.templateOnly} template-only, ${result.summary.actualOnly} actual-only)`,
      );
    } catch (err) {
      await this.fail(id, err);
    }
  }

  private async fail(id: string, err: unknown): Promise<void> {
    const failure =
      err instanceof HppdError
        ? err
        : new InternalFailureError(`Unexpected error while processing the comparison: ${describeError(err)}`, {
            cause: err,
          });
    console.error(`[Job] ${id}: failed (${failure.code}): ${failure.message}`);

    try {
      await this.transition(id, {
        state: "Failed",
        statusMessage: "Comparison failed",
        error: failure.message,
        errorCode: failure.code,
        finishedAt: this.timestamp(),
      });
      await rm(this.jobDir(id), { recursive: true, force: true });
    } catch (cleanupErr) {
      console.error(`[Job] ${id}: could not record failure: ${describeError(cleanupErr)}`);
    }
  }

  /**
   * Applies a patch unless the job is already terminal. Percent only moves
   * forward and stays below 100 until the job completes.
   */
  private async transition(id: string, patch: JobPatch): Promise<void> {
    const current = await this.options.store.get(id);
    if (!current) return;
    if (TERMINAL_JOB_STATES.has(current.state)) {
      console.warn(`[Job] ${id}: ignoring update after ${current.state}`);
      return;
    }

    const requested = patch.percent ?? current.percent;
    const percent =
      patch.state === "Completed" ? PROGRESS.DONE : Math.min(Math.max(current.percent, requested), PROGRESS.DONE - 1);
    await this.options.store.update(id, { ...patch, percent, updatedAt: this.timestamp() });
  }

  private async purge(job: Job): Promise<void> {
    await this.options.store.delete(job.id);
    await rm(this.jobDir(job.id), { recursive: true, force: true });
    console.log(`[Job] ${job.id}: purged`);
  }

  private isExpired(job: Job): boolean {
    if (!TERMINAL_JOB_STATES.has(job.state) || !job.finishedAt) return false;
    return this.now().getTime() - Date.parse(job.finishedAt) >= this.options.retentionMs;
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.running.size === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private jobDir(jobId: string): string {
    return join(this.options.workDir, jobId);
  }

  private now(): Date {
    return this.options.now?.() ?? new Date();
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
