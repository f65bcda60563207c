export type ErrorKind =
  | 'UnsupportedFormatError'
  | 'CorruptInputError'
  | 'SchemaNotFoundError'
  | 'UnparsableRecordError'
  | 'ClassifierUnavailableError'
  | 'StageTimeoutError'
  | 'DuplicateJobError'
  | 'NotReadyError'
  | 'Cancelled'
  | 'JobNotFoundError'
  | 'UploadNotFoundError'
  | 'InvalidStageTransitionError'
  | 'InternalError';

export abstract class AnalysisError extends Error {
  abstract readonly kind: ErrorKind;
  readonly retryable: boolean = false;
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }
}

export class UnsupportedFormatError extends AnalysisError {
  readonly kind = 'UnsupportedFormatError';

  constructor(readonly declaredFormat: string) {
    super(`Unsupported statement format "${declaredFormat}"`, { declaredFormat });
  }
}

export class CorruptInputError extends AnalysisError {
  readonly kind = 'CorruptInputError';
}

export class SchemaNotFoundError extends AnalysisError {
  readonly kind = 'SchemaNotFoundError';
}

export class UnparsableRecordError extends AnalysisError {
  readonly kind = 'UnparsableRecordError';

  constructor(
    readonly rowIndex: number,
    readonly reason: string,
  ) {
    super(`Row ${rowIndex}: ${reason}`, { rowIndex, reason });
  }
}

export class ClassifierUnavailableError extends AnalysisError {
  readonly kind = 'ClassifierUnavailableError';
  override readonly retryable: boolean;

  constructor(message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, {}, { cause: options.cause });
    this.retryable = options.retryable ?? true;
  }
}

export class StageTimeoutError extends AnalysisError {
  readonly kind = 'StageTimeoutError';
  override readonly retryable = true;

  constructor(
    readonly stage: string,
    readonly timeoutMs: number,
  ) {
    super(`Stage ${stage} exceeded its ${timeoutMs}ms budget`, { stage, timeoutMs });
  }
}

export class DuplicateJobError extends AnalysisError {
  readonly kind = 'DuplicateJobError';

  constructor(
    readonly statementId: string,
    readonly activeJobId: string,
  ) {
    super(`Statement ${statementId} already has an active job (${activeJobId})`, { statementId, activeJobId });
  }
}

export class NotReadyError extends AnalysisError {
  readonly kind = 'NotReadyError';

  constructor(
    readonly jobId: string,
    readonly stage: string,
  ) {
    super(`Job ${jobId} has no result yet (stage ${stage})`, { jobId, stage });
  }
}

export class CancelledError extends AnalysisError {
  readonly kind = 'Cancelled';

  constructor(readonly jobId: string) {
    super(`Job ${jobId} was cancelled`, { jobId });
  }
}

export class JobNotFoundError extends AnalysisError {
  readonly kind = 'JobNotFoundError';

  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found`, { jobId });
  }
}

export class UploadNotFoundError extends AnalysisError {
  readonly kind = 'UploadNotFoundError';

  constructor(readonly uploadId: string) {
    super(`Upload ${uploadId} not found`, { uploadId });
  }
}

export class InvalidStageTransitionError extends AnalysisError {
  readonly kind = 'InvalidStageTransitionError';

  constructor(
    readonly from: string,
    readonly to: string,
  ) {
    super(`Illegal stage transition ${from} -> ${to}`, { from, to });
  }
}

export const toErrorKind = (error: unknown): ErrorKind =>
  error instanceof AnalysisError ? error.kind : 'InternalError';

export const isRetryable = (error: unknown): boolean => error instanceof AnalysisError && error.retryable;

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
