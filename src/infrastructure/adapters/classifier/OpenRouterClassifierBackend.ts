import OpenAI from 'openai';
import { ClassificationDTO, ClassificationSchema } from '../../../application/dto/ClassificationDTO.js';
import { ClassifierBackendPort } from '../../../application/ports/ClassifierBackendPort.js';
import { ClassifierUnavailableError } from '../../../domain/errors/AnalysisErrors.js';
import { AppConfig } from '../../config/Config.js';
import { Logger, componentLogger } from '../../logging/Logger.js';

export interface ClassifierBackendOptions {
  model: string;
  labels: readonly string[];
}

export const buildClassifierPrompt = (labels: readonly string[]): string => `Classify a bank transaction into exactly one spending category. Return ONLY a JSON object, no explanation.

Format: {"categoryLabel":"<one of the categories>","confidence":0.0}

Categories: ${labels.map((label) => JSON.stringify(label)).join(', ')}

RULES:
- categoryLabel must be copied verbatim from the list above
- confidence is between 0 and 1; use a low value when the merchant is ambiguous
- Use "Uncategorized" when nothing fits`;

/** Reads the model's reply, tolerating prose around the JSON object. */
export const parseClassifierReply = (content: string | null | undefined): ClassificationDTO => {
  const jsonMatch = content?.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new ClassifierUnavailableError('Classifier reply contained no JSON object');
  }

  let payload: unknown;
  try {
    payload = JSON.parse(jsonMatch[0]);
  } catch (error) {
    throw new ClassifierUnavailableError('Classifier reply was not valid JSON', { cause: error });
  }

  const parsed = ClassificationSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ClassifierUnavailableError(`Classifier reply failed validation: ${parsed.error.message}`);
  }
  return parsed.data;
};

/**
 * Timeouts, connection failures, rate limits and 5xx replies are transient; any other API
 * error (bad key, bad request) will not fix itself on retry.
 */
export const toClassifierError = (error: unknown): ClassifierUnavailableError => {
  if (error instanceof ClassifierUnavailableError) {
    return error;
  }

  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ClassifierUnavailableError('Classifier request timed out', { cause: error });
  }

  if (error instanceof OpenAI.APIConnectionError) {
    return new ClassifierUnavailableError(`Classifier unreachable: ${error.message}`, { cause: error });
  }

  if (error instanceof OpenAI.APIError) {
    const status = error.status ?? 0;
    const retryable = status === 429 || status >= 500;
    return new ClassifierUnavailableError(`Classifier request failed with status ${status}`, { retryable, cause: error });
  }

  return new ClassifierUnavailableError(
    `Classifier request failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
    { retryable: false, cause: error },
  );
};

export class OpenRouterClassifierBackend implements ClassifierBackendPort {
  private readonly prompt: string;

  constructor(
    private readonly client: OpenAI,
    private readonly options: ClassifierBackendOptions,
    private readonly logger: Logger = componentLogger('OpenRouterClassifierBackend'),
  ) {
    this.prompt = buildClassifierPrompt(options.labels);
  }

  static fromConfig(config: AppConfig['classifier'], labels: readonly string[]): OpenRouterClassifierBackend {
    const client = new OpenAI({
      baseURL: config.baseUrl,
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: 0, // retries belong to the pipeline's stage policy
    });
    return new OpenRouterClassifierBackend(client, { model: config.model, labels });
  }

  async classify(
    merchantText: string,
    description: string,
    options: { signal?: AbortSignal } = {},
  ): Promise<ClassificationDTO> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.options.model,
          messages: [
            { role: 'system', content: this.prompt },
            { role: 'user', content: JSON.stringify({ merchant: merchantText, description }) },
          ],
          temperature: 0,
          max_tokens: 100,
        },
        { signal: options.signal },
      );
      content = response.choices[0]?.message?.content;
    } catch (error) {
      if (options.signal?.aborted) {
        throw options.signal.reason;
      }
      const mapped = toClassifierError(error);
      this.logger.warn({ merchant: merchantText, retryable: mapped.retryable, err: error }, mapped.message);
      throw mapped;
    }

    return parseClassifierReply(content);
  }
}
