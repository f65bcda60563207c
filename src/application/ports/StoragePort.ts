import { AnalysisJob, JobErrorDetail, JobStage } from '../../domain/entities/AnalysisJob.js';
import { AnalysisResult, StatementSummary } from '../../domain/entities/AnalysisResult.js';
import { Transaction } from '../../domain/entities/Transaction.js';

export interface StoragePort {
  saveJob(job: AnalysisJob): Promise<void>;
  loadJob(jobId: string): Promise<AnalysisJob | null>;
  listJobs(): Promise<AnalysisJob[]>;
  /** Stage, entry timestamp and error detail change in one write; illegal transitions are rejected. */
  updateJobStage(jobId: string, stage: JobStage, timestamp: string, errorDetail?: JobErrorDetail | null): Promise<AnalysisJob>;
  saveResult(result: AnalysisResult): Promise<void>;
  /**
   * Stores the result and moves its job to Completed in one write. Fails without storing
   * anything when the job can no longer complete.
   */
  completeJob(result: AnalysisResult, timestamp: string, errorDetail: JobErrorDetail | null): Promise<AnalysisJob>;
  loadResult(jobId: string): Promise<AnalysisResult | null>;
  /** Transactions and summaries come from completed jobs only. */
  loadAccountHistory(accountId: string): Promise<Transaction[]>;
  loadLatestSummary(accountId: string): Promise<StatementSummary | null>;
}
