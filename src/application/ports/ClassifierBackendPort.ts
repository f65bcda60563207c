import { ClassificationDTO } from '../dto/ClassificationDTO.js';

export interface ClassifierBackendPort {
  /** May fail with ClassifierUnavailableError; callers decide whether to retry. */
  classify(merchantText: string, description: string, options?: { signal?: AbortSignal }): Promise<ClassificationDTO>;
}
