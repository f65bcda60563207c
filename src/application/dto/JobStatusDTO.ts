import { JobErrorDetail, JobStage, StageTransition } from '../../domain/entities/AnalysisJob.js';

export interface JobStatusDTO {
  jobId: string;
  statementId: string;
  stage: JobStage;
  errorDetail?: JobErrorDetail;
  history: StageTransition[];
}
