import { StoragePort } from '../../../application/ports/StoragePort.js';
import { AnalysisJob, JobErrorDetail, JobStage, applyTransition } from '../../../domain/entities/AnalysisJob.js';
import { AnalysisResult, StatementSummary } from '../../../domain/entities/AnalysisResult.js';
import { Transaction } from '../../../domain/entities/Transaction.js';
import { JobNotFoundError } from '../../../domain/errors/AnalysisErrors.js';

/**
 * Process-local persistence. Every read and write copies, so callers can never mutate what is
 * stored; stage changes go through the same transition check as the domain model.
 */
export class InMemoryStorageAdapter implements StoragePort {
  private readonly jobs = new Map<string, AnalysisJob>();
  private readonly results = new Map<string, AnalysisResult>();

  async saveJob(job: AnalysisJob): Promise<void> {
    this.jobs.set(job.id, structuredClone(job));
  }

  async loadJob(jobId: string): Promise<AnalysisJob | null> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  async listJobs(): Promise<AnalysisJob[]> {
    return Array.from(this.jobs.values())
      .map((job) => structuredClone(job))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async updateJobStage(
    jobId: string,
    stage: JobStage,
    timestamp: string,
    errorDetail?: JobErrorDetail | null,
  ): Promise<AnalysisJob> {
    const current = this.jobs.get(jobId);
    if (!current) {
      throw new JobNotFoundError(jobId);
    }

    const updated = applyTransition(current, stage, timestamp, errorDetail);
    this.jobs.set(jobId, structuredClone(updated));
    return structuredClone(updated);
  }

  async saveResult(result: AnalysisResult): Promise<void> {
    if (this.results.has(result.jobId)) {
      throw new Error(`Result for job ${result.jobId} already exists`);
    }
    this.results.set(result.jobId, structuredClone(result));
  }

  async completeJob(result: AnalysisResult, timestamp: string, errorDetail: JobErrorDetail | null): Promise<AnalysisJob> {
    const current = this.jobs.get(result.jobId);
    if (!current) {
      throw new JobNotFoundError(result.jobId);
    }
    if (this.results.has(result.jobId)) {
      throw new Error(`Result for job ${result.jobId} already exists`);
    }

    const completed = applyTransition(current, 'Completed', timestamp, errorDetail);
    this.jobs.set(completed.id, structuredClone(completed));
    this.results.set(result.jobId, structuredClone(result));
    return structuredClone(completed);
  }

  async loadResult(jobId: string): Promise<AnalysisResult | null> {
    const result = this.results.get(jobId);
    return result ? structuredClone(result) : null;
  }

  async loadAccountHistory(accountId: string): Promise<Transaction[]> {
    return this.resultsFor(accountId).flatMap((result) => structuredClone(result.transactions));
  }

  async loadLatestSummary(accountId: string): Promise<StatementSummary | null> {
    const latest = this.resultsFor(accountId).at(-1);
    return latest ? structuredClone(latest.summary) : null;
  }

  private resultsFor(accountId: string): AnalysisResult[] {
    return Array.from(this.results.values())
      .filter((result) => result.accountId === accountId && this.jobs.get(result.jobId)?.stage === 'Completed')
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }
}
