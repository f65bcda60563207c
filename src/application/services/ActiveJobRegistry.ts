import { DuplicateJobError } from '../../domain/errors/AnalysisErrors.js';

interface ActiveRun {
  jobId: string;
  statementId: string;
  controller: AbortController;
}

/**
 * Tracks the one live run allowed per statement. A run is claimed on submission and released
 * when its job reaches a terminal stage; aborting signals the run without releasing it.
 */
export class ActiveJobRegistry {
  private readonly byStatement = new Map<string, ActiveRun>();
  private readonly byJob = new Map<string, ActiveRun>();

  claim(statementId: string, jobId: string): AbortSignal {
    const existing = this.byStatement.get(statementId);
    if (existing) {
      throw new DuplicateJobError(statementId, existing.jobId);
    }

    const run: ActiveRun = { jobId, statementId, controller: new AbortController() };
    this.byStatement.set(statementId, run);
    this.byJob.set(jobId, run);
    return run.controller.signal;
  }

  release(jobId: string): void {
    const run = this.byJob.get(jobId);
    if (!run) {
      return;
    }
    this.byJob.delete(jobId);
    if (this.byStatement.get(run.statementId) === run) {
      this.byStatement.delete(run.statementId);
    }
  }

  /** False once the run has been aborted or released; late work must be discarded. */
  isActive(jobId: string): boolean {
    const run = this.byJob.get(jobId);
    return run !== undefined && !run.controller.signal.aborted;
  }

  abort(jobId: string, reason: unknown): boolean {
    const run = this.byJob.get(jobId);
    if (!run || run.controller.signal.aborted) {
      return false;
    }
    run.controller.abort(reason);
    return true;
  }

  activeJobFor(statementId: string): string | undefined {
    return this.byStatement.get(statementId)?.jobId;
  }

  get size(): number {
    return this.byJob.size;
  }
}
