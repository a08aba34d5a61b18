import type { Job } from "@hppd/shared";
import { DuplicateJobError } from "../errors";

/**
 * Registry of comparison jobs keyed by id. Implementations hand out copies;
 * the job manager is the only writer.
 */
export interface JobStore {
  create(job: Job): Promise<Job>;
  get(id: string): Promise<Job | undefined>;
  update(id: string, patch: Partial<Omit<Job, "id">>): Promise<Job | undefined>;
  delete(id: string): Promise<boolean>;
  list(): Promise<Job[]>;
}

export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, Job>();

  async create(job: Job): Promise<Job> {
    if (this.jobs.has(job.id)) throw new DuplicateJobError(job.id);
    this.jobs.set(job.id, structuredClone(job));
    return structuredClone(job);
  }

  async get(id: string): Promise<Job | undefined> {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : undefined;
  }

  async update(id: string, patch: Partial<Omit<Job, "id">>): Promise<Job | undefined> {
    const current = this.jobs.get(id);
    if (!current) return undefined;
    const next: Job = { ...current, ...structuredClone(patch), id };
    this.jobs.set(id, next);
    return structuredClone(next);
  }

  async delete(id: string): Promise<boolean> {
    return this.jobs.delete(id);
  }

  async list(): Promise<Job[]> {
    return [...this.jobs.values()].map((job) => structuredClone(job));
  }
}
