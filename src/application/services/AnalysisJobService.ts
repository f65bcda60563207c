import { randomUUID } from 'node:crypto';
import {
  AnalysisJob,
  JobErrorDetail,
  JobFailure,
  JobStage,
  ProcessingStage,
  emptyErrorDetail,
  isTerminal,
} from '../../domain/entities/AnalysisJob.js';
import { AnalysisResult } from '../../domain/entities/AnalysisResult.js';
import { StatementUpload } from '../../domain/entities/StatementUpload.js';
import {
  AnalysisError,
  CancelledError,
  ErrorKind,
  InvalidStageTransitionError,
  JobNotFoundError,
  NotReadyError,
  StageTimeoutError,
  UploadNotFoundError,
  errorMessage,
  isRetryable,
  toErrorKind,
} from '../../domain/errors/AnalysisErrors.js';
import { Logger, componentLogger } from '../../infrastructure/logging/Logger.js';
import { JobStatusDTO } from '../dto/JobStatusDTO.js';
import { ObjectStoragePort } from '../ports/ObjectStoragePort.js';
import { StoragePort } from '../ports/StoragePort.js';
import { WorkerPool } from '../support/concurrency.js';
import { RetryPolicy, withRetry, withTimeout } from '../support/retry.js';
import { ActiveJobRegistry } from './ActiveJobRegistry.js';
import { AggregationService } from './AggregationService.js';
import { AnomalyDetectionService } from './AnomalyDetectionService.js';
import { CategorizationEngine } from './CategorizationEngine.js';
import { ExtractionService } from './ExtractionService.js';
import { NormalizationService } from './NormalizationService.js';

export interface PipelineSettings {
  workerConcurrency: number;
  headerScanWindow: number;
  stageTimeoutsMs: Record<ProcessingStage, number>;
  retry: RetryPolicy;
  /** Non-terminal jobs older than this with no live run are failed by the sweep. */
  staleJobAgeMs: number;
  defaultCurrency: string;
}

export interface AnalysisJobServiceDeps {
  storage: StoragePort;
  objectStorage: ObjectStoragePort;
  extraction: ExtractionService;
  normalization: NormalizationService;
  categorization: CategorizationEngine;
  anomalies: AnomalyDetectionService;
  aggregation: AggregationService;
  settings: PipelineSettings;
  registry?: ActiveJobRegistry;
  clock?: () => Date;
  generateId?: () => string;
  logger?: Logger;
}

export interface BatchSubmission {
  uploadId: string;
  declaredFormat: string;
}

export type BatchSubmissionOutcome =
  | { uploadId: string; status: 'queued'; jobId: string }
  | { uploadId: string; status: 'rejected'; errorKind: ErrorKind; message: string };

export interface JobStatistics {
  byStage: Record<JobStage, number>;
  total: number;
  running: number;
  queued: number;
}

// Only these stages talk to something that can fail transiently.
const RETRYABLE_STAGES: ReadonlySet<ProcessingStage> = new Set<ProcessingStage>(['Extracting', 'Categorizing']);

interface RunProgress {
  stage: JobStage;
  attempts: number;
  detail: JobErrorDetail;
}

const toStatus = (job: AnalysisJob): JobStatusDTO => ({
  jobId: job.id,
  statementId: job.statementId,
  stage: job.stage,
  ...(job.errorDetail ? { errorDetail: job.errorDetail } : {}),
  history: job.history,
});

const emptyStageCounts = (): Record<JobStage, number> => ({
  Created: 0,
  Extracting: 0,
  Normalizing: 0,
  Categorizing: 0,
  DetectingAnomalies: 0,
  Aggregating: 0,
  Completed: 0,
  Failed: 0,
});

/**
 * Owns the job lifecycle: submission, the stage-by-stage run on the worker pool, cancellation
 * and the read side. Only this service writes job stages.
 */
export class AnalysisJobService {
  private readonly storage: StoragePort;
  private readonly objectStorage: ObjectStoragePort;
  private readonly extraction: ExtractionService;
  private readonly normalization: NormalizationService;
  private readonly categorization: CategorizationEngine;
  private readonly anomalies: AnomalyDetectionService;
  private readonly aggregation: AggregationService;
  private readonly settings: PipelineSettings;
  private readonly registry: ActiveJobRegistry;
  private readonly clock: () => Date;
  private readonly generateId: () => string;
  private readonly logger: Logger;
  private readonly pool: WorkerPool;

  constructor(deps: AnalysisJobServiceDeps) {
    this.storage = deps.storage;
    this.objectStorage = deps.objectStorage;
    this.extraction = deps.extraction;
    this.normalization = deps.normalization;
    this.categorization = deps.categorization;
    this.anomalies = deps.anomalies;
    this.aggregation = deps.aggregation;
    this.settings = deps.settings;
    this.registry = deps.registry ?? new ActiveJobRegistry();
    this.clock = deps.clock ?? (() => new Date());
    this.generateId = deps.generateId ?? randomUUID;
    this.logger = deps.logger ?? componentLogger('AnalysisJobService');
    this.pool = new WorkerPool(this.settings.workerConcurrency, (error) => {
      this.logger.error({ err: error }, 'analysis job crashed outside its stage handling');
    });
  }

  /**
   * Creates a job for the upload and queues it. The duplicate check happens before anything
   * is written, so a rejected submission leaves no trace.
   */
  async submitStatement(uploadId: string, declaredFormat: string): Promise<string> {
    const upload = await this.objectStorage.describeUpload(uploadId);
    if (!upload) {
      throw new UploadNotFoundError(uploadId);
    }

    const jobId = this.generateId();
    const signal = this.registry.claim(upload.id, jobId);
    const createdAt = this.timestamp();
    const job: AnalysisJob = {
      id: jobId,
      statementId: upload.id,
      accountId: upload.accountId,
      declaredFormat,
      stage: 'Created',
      errorDetail: null,
      history: [{ stage: 'Created', enteredAt: createdAt }],
      createdAt,
      updatedAt: createdAt,
    };

    try {
      await this.storage.saveJob(job);
    } catch (error) {
      this.registry.release(jobId);
      throw error;
    }

    this.logger.info({ jobId, statementId: upload.id, declaredFormat }, 'analysis job queued');
    this.pool.submit(() => this.runJob(job, upload, signal));
    return jobId;
  }

  /** Submits each upload in order; one rejection does not stop the rest. */
  async submitBatch(submissions: readonly BatchSubmission[]): Promise<BatchSubmissionOutcome[]> {
    const outcomes: BatchSubmissionOutcome[] = [];
    for (const { uploadId, declaredFormat } of submissions) {
      try {
        const jobId = await this.submitStatement(uploadId, declaredFormat);
        outcomes.push({ uploadId, status: 'queued', jobId });
      } catch (error) {
        if (!(error instanceof AnalysisError)) {
          throw error;
        }
        outcomes.push({ uploadId, status: 'rejected', errorKind: error.kind, message: error.message });
      }
    }
    return outcomes;
  }

  async getJobStatus(jobId: string): Promise<JobStatusDTO> {
    return toStatus(await this.requireJob(jobId));
  }

  async getResult(jobId: string): Promise<AnalysisResult> {
    const job = await this.requireJob(jobId);
    if (job.stage !== 'Completed') {
      throw new NotReadyError(jobId, job.stage);
    }

    const result = await this.storage.loadResult(jobId);
    if (!result) {
      throw new NotReadyError(jobId, job.stage);
    }
    return result;
  }

  /**
   * Signals the run and moves the job straight to Failed. Whatever the run produces after this
   * point is discarded.
   */
  async cancelJob(jobId: string): Promise<JobStatusDTO> {
    const job = await this.requireJob(jobId);
    if (isTerminal(job.stage)) {
      throw new InvalidStageTransitionError(job.stage, 'Failed');
    }

    const reason = new CancelledError(jobId);
    this.registry.abort(jobId, reason);

    const failure: JobFailure = { stage: job.stage, kind: reason.kind, message: reason.message, attempts: 0 };
    const updated = await this.storage.updateJobStage(jobId, 'Failed', this.timestamp(), {
      ...(job.errorDetail ?? emptyErrorDetail()),
      failure,
    });

    this.logger.info({ jobId, statementId: job.statementId, stage: job.stage }, 'analysis job cancelled');
    return toStatus(updated);
  }

  /**
   * Fails jobs left mid-pipeline with no live run behind them, typically after a restart.
   * Returns the ids it failed.
   */
  async sweepStaleJobs(): Promise<string[]> {
    const now = this.clock();
    const swept: string[] = [];

    for (const job of await this.storage.listJobs()) {
      if (isTerminal(job.stage) || this.registry.activeJobFor(job.statementId) === job.id) {
        continue;
      }

      const ageMs = now.getTime() - Date.parse(job.updatedAt);
      if (ageMs <= this.settings.staleJobAgeMs) {
        continue;
      }

      const timeout = new StageTimeoutError('processing', this.settings.staleJobAgeMs);
      await this.storage.updateJobStage(job.id, 'Failed', now.toISOString(), {
        ...(job.errorDetail ?? emptyErrorDetail()),
        failure: { stage: job.stage, kind: timeout.kind, message: timeout.message, attempts: 0 },
      });
      swept.push(job.id);
    }

    if (swept.length) {
      this.logger.warn({ jobIds: swept }, 'failed stale analysis jobs');
    }
    return swept;
  }

  async getJobStatistics(): Promise<JobStatistics> {
    const jobs = await this.storage.listJobs();
    const byStage = emptyStageCounts();
    jobs.forEach((job) => {
      byStage[job.stage] += 1;
    });

    return {
      byStage,
      total: jobs.length,
      running: this.pool.activeCount,
      queued: this.pool.queuedCount,
    };
  }

  /** Resolves once every queued and running job has finished. */
  onIdle(): Promise<void> {
    return this.pool.onIdle();
  }

  private async runJob(job: AnalysisJob, upload: StatementUpload, signal: AbortSignal): Promise<void> {
    const log = this.logger.child({ jobId: job.id, statementId: job.statementId });
    const startedAt = this.clock().getTime();
    const progress: RunProgress = { stage: 'Created', attempts: 0, detail: emptyErrorDetail() };

    try {
      const records = await this.runStage(job.id, 'Extracting', progress, signal, log, async (stageSignal) => {
        const bytes = await this.objectStorage.fetchFile(upload.id);
        return this.extraction.extract(bytes, job.declaredFormat, {
          headerScanWindow: this.settings.headerScanWindow,
          signal: stageSignal,
        });
      });

      const normalized = await this.runStage(job.id, 'Normalizing', progress, signal, log, async () =>
        this.normalization.normalize(records, {
          statementId: job.statementId,
          accountId: job.accountId,
          referenceYear: new Date(upload.uploadedAt).getUTCFullYear(),
          defaultCurrency: this.settings.defaultCurrency,
        }),
      );
      progress.detail = {
        ...progress.detail,
        unparsableRecords: normalized.rejected.length,
        rejectedRecords: normalized.rejected,
      };
      if (normalized.rejected.length) {
        log.warn({ rejected: normalized.rejected.length }, 'skipped unparsable records');
      }

      const categorized = await this.runStage(job.id, 'Categorizing', progress, signal, log, (stageSignal) =>
        this.categorization.categorizeAll(normalized.transactions, { signal: stageSignal }),
      );

      const { transactions, findings } = await this.runStage(
        job.id,
        'DetectingAnomalies',
        progress,
        signal,
        log,
        async () => {
          const history = await this.storage.loadAccountHistory(job.accountId);
          const detected = this.anomalies.detect(categorized, history);
          return { transactions: this.anomalies.markAnomalies(categorized, detected), findings: detected };
        },
      );

      const summary = await this.runStage(job.id, 'Aggregating', progress, signal, log, async () => {
        const previous = await this.storage.loadLatestSummary(job.accountId);
        return this.aggregation.aggregate(transactions, previous);
      });

      this.ensureActive(job.id, signal);
      const result: AnalysisResult = {
        jobId: job.id,
        statementId: job.statementId,
        accountId: job.accountId,
        transactions,
        summary,
        anomalies: findings.map((finding) => finding.transactionId),
        anomalyFindings: findings,
        unparsableRecords: progress.detail.unparsableRecords,
        processingTimeMs: Math.max(0, this.clock().getTime() - startedAt),
        createdAt: this.timestamp(),
      };
      progress.stage = 'Completed';
      await this.storage.completeJob(
        result,
        this.timestamp(),
        progress.detail.unparsableRecords ? progress.detail : null,
      );
      log.info(
        { transactions: transactions.length, anomalies: findings.length, processingTimeMs: result.processingTimeMs },
        'analysis job completed',
      );
    } catch (error) {
      await this.failJob(job.id, progress, error, log);
    } finally {
      this.registry.release(job.id);
    }
  }

  /**
   * Enters `stage` and runs `task` under the stage's time budget. Retryable failures are
   * retried with backoff in the stages that allow it.
   */
  private async runStage<T>(
    jobId: string,
    stage: ProcessingStage,
    progress: RunProgress,
    signal: AbortSignal,
    log: Logger,
    task: (stageSignal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    this.ensureActive(jobId, signal);
    progress.stage = stage;
    progress.attempts = 0;
    await this.storage.updateJobStage(jobId, stage, this.timestamp());
    log.debug({ stage }, 'stage started');

    const policy = RETRYABLE_STAGES.has(stage) ? this.settings.retry : { ...this.settings.retry, maxAttempts: 1 };
    const output = await withRetry(
      (attempt) => {
        progress.attempts = attempt;
        return withTimeout(task, { stage, timeoutMs: this.settings.stageTimeoutsMs[stage], signal });
      },
      {
        policy,
        shouldRetry: isRetryable,
        signal,
        onAttemptFailed: (error, attempt, retryInMs) => {
          if (retryInMs !== null) {
            log.warn({ stage, attempt, retryInMs, err: error }, 'stage attempt failed, retrying');
          }
        },
      },
    );

    this.ensureActive(jobId, signal);
    return output;
  }

  private async failJob(jobId: string, progress: RunProgress, error: unknown, log: Logger): Promise<void> {
    if (!this.registry.isActive(jobId)) {
      log.info({ stage: progress.stage }, 'discarding outcome of cancelled job');
      return;
    }

    const failure: JobFailure = {
      stage: progress.stage,
      kind: toErrorKind(error),
      message: errorMessage(error),
      attempts: progress.attempts,
    };
    log.error({ err: error, ...failure }, 'analysis job failed');
    await this.storage.updateJobStage(jobId, 'Failed', this.timestamp(), { ...progress.detail, failure });
  }

  private ensureActive(jobId: string, signal: AbortSignal): void {
    if (!this.registry.isActive(jobId)) {
      throw signal.reason ?? new CancelledError(jobId);
    }
  }

  private async requireJob(jobId: string): Promise<AnalysisJob> {
    const job = await this.storage.loadJob(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  private timestamp(): string {
    return this.clock().toISOString();
  }
}
