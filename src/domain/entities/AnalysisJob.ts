import { ErrorKind, InvalidStageTransitionError } from '../errors/AnalysisErrors.js';

export type JobStage =
  | 'Created'
  | 'Extracting'
  | 'Normalizing'
  | 'Categorizing'
  | 'DetectingAnomalies'
  | 'Aggregating'
  | 'Completed'
  | 'Failed';

/** Stages that do work and carry their own time budget. */
export type ProcessingStage = Exclude<JobStage, 'Created' | 'Completed' | 'Failed'>;

export const PIPELINE_ORDER: readonly JobStage[] = [
  'Created',
  'Extracting',
  'Normalizing',
  'Categorizing',
  'DetectingAnomalies',
  'Aggregating',
  'Completed',
];

export const TERMINAL_STAGES: ReadonlySet<JobStage> = new Set<JobStage>(['Completed', 'Failed']);

export interface StageTransition {
  stage: JobStage;
  enteredAt: string; // ISO timestamp
}

export interface RejectedRecord {
  rowIndex: number;
  reason: string;
}

export interface JobFailure {
  stage: JobStage;
  kind: ErrorKind;
  message: string;
  attempts: number;
}

export interface JobErrorDetail {
  unparsableRecords: number;
  rejectedRecords: RejectedRecord[];
  failure: JobFailure | null;
}

export interface AnalysisJob {
  id: string;
  statementId: string;
  accountId: string;
  declaredFormat: string;
  stage: JobStage;
  errorDetail: JobErrorDetail | null;
  history: StageTransition[];
  createdAt: string;
  updatedAt: string;
}

export const isTerminal = (stage: JobStage): boolean => TERMINAL_STAGES.has(stage);

/**
 * Stages only move forward one step at a time, and any non-terminal stage may fail.
 */
export const canTransition = (from: JobStage, to: JobStage): boolean => {
  if (isTerminal(from)) {
    return false;
  }

  if (to === 'Failed') {
    return true;
  }

  return PIPELINE_ORDER.indexOf(to) === PIPELINE_ORDER.indexOf(from) + 1;
};

export const assertTransition = (from: JobStage, to: JobStage): void => {
  if (!canTransition(from, to)) {
    throw new InvalidStageTransitionError(from, to);
  }
};

export const applyTransition = (
  job: AnalysisJob,
  stage: JobStage,
  timestamp: string,
  errorDetail?: JobErrorDetail | null,
): AnalysisJob => {
  assertTransition(job.stage, stage);

  return {
    ...job,
    stage,
    errorDetail: errorDetail === undefined ? job.errorDetail : errorDetail,
    history: [...job.history, { stage, enteredAt: timestamp }],
    updatedAt: timestamp,
  };
};

export const emptyErrorDetail = (): JobErrorDetail => ({
  unparsableRecords: 0,
  rejectedRecords: [],
  failure: null,
});
