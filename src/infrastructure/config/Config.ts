import { ProcessingStage } from '../../domain/entities/AnalysisJob.js';

export interface AppConfig {
  app: {
    port: number;
    defaultCurrency: string;
    maxUploadBytes: number;
  };
  pipeline: {
    workerConcurrency: number;
    headerScanWindow: number;
    stageTimeoutsMs: Record<ProcessingStage, number>;
    retry: {
      maxAttempts: number;
      baseDelayMs: number;
      maxDelayMs: number;
    };
    staleJobAgeMs: number;
  };
  categorization: {
    confidenceThreshold: number;
    concurrency: number;
    cacheSize: number;
    catalogPath?: string;
  };
  anomaly: {
    stddevMultiplier: number;
    newMerchantThreshold: number;
    minimumSamples: number;
  };
  classifier: {
    enabled: boolean;
    apiKey: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
  };
}

type Env = Record<string, string | undefined>;

const readEnv = (env: Env, name: string): string | null => {
  const value = env[name];
  if (!value) return null;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : null;
};

const readNumberEnv = (env: Env, name: string, fallback: number): number => {
  const raw = readEnv(env, name);
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const readIntegerEnv = (env: Env, name: string, fallback: number): number =>
  Math.floor(readNumberEnv(env, name, fallback));

const readRatioEnv = (env: Env, name: string, fallback: number): number => {
  const value = readNumberEnv(env, name, fallback);
  return value <= 1 ? value : fallback;
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const apiKey = readEnv(env, 'OPENROUTER_API_KEY') ?? '';

  return {
    app: {
      port: readIntegerEnv(env, 'PORT', 4000),
      defaultCurrency: (readEnv(env, 'APP_DEFAULT_CURRENCY') ?? 'USD').toUpperCase(),
      maxUploadBytes: readIntegerEnv(env, 'MAX_UPLOAD_BYTES', 10 * 1024 * 1024),
    },
    pipeline: {
      workerConcurrency: readIntegerEnv(env, 'PIPELINE_WORKER_CONCURRENCY', 2),
      headerScanWindow: readIntegerEnv(env, 'PIPELINE_HEADER_SCAN_WINDOW', 25),
      stageTimeoutsMs: {
        Extracting: readIntegerEnv(env, 'PIPELINE_EXTRACT_TIMEOUT_MS', 60_000),
        Normalizing: readIntegerEnv(env, 'PIPELINE_NORMALIZE_TIMEOUT_MS', 30_000),
        Categorizing: readIntegerEnv(env, 'PIPELINE_CATEGORIZE_TIMEOUT_MS', 120_000),
        DetectingAnomalies: readIntegerEnv(env, 'PIPELINE_ANOMALY_TIMEOUT_MS', 30_000),
        Aggregating: readIntegerEnv(env, 'PIPELINE_AGGREGATE_TIMEOUT_MS', 30_000),
      },
      retry: {
        maxAttempts: readIntegerEnv(env, 'PIPELINE_RETRY_MAX_ATTEMPTS', 3),
        baseDelayMs: readIntegerEnv(env, 'PIPELINE_RETRY_BASE_DELAY_MS', 500),
        maxDelayMs: readIntegerEnv(env, 'PIPELINE_RETRY_MAX_DELAY_MS', 5_000),
      },
      staleJobAgeMs: readIntegerEnv(env, 'PIPELINE_STALE_JOB_AGE_MS', 30 * 60 * 1000),
    },
    categorization: {
      confidenceThreshold: readRatioEnv(env, 'CATEGORY_CONFIDENCE_THRESHOLD', 0.9),
      concurrency: readIntegerEnv(env, 'CATEGORY_CONCURRENCY', 4),
      cacheSize: readIntegerEnv(env, 'CATEGORY_CACHE_SIZE', 5000),
      catalogPath: readEnv(env, 'CATEGORY_CATALOG_PATH') ?? undefined,
    },
    anomaly: {
      stddevMultiplier: readNumberEnv(env, 'ANOMALY_STDDEV_MULTIPLIER', 3),
      newMerchantThreshold: readIntegerEnv(env, 'ANOMALY_NEW_MERCHANT_THRESHOLD_MINOR', 100_000),
      minimumSamples: readIntegerEnv(env, 'ANOMALY_MINIMUM_SAMPLES', 3),
    },
    classifier: {
      enabled: Boolean(apiKey) && readEnv(env, 'CLASSIFIER_ENABLED') !== 'false',
      apiKey,
      baseUrl: (readEnv(env, 'CLASSIFIER_BASE_URL') ?? 'https://openrouter.ai/api/v1').replace(/\/$/, ''),
      model: readEnv(env, 'CLASSIFIER_MODEL') ?? 'openai/gpt-4o-mini',
      timeoutMs: readIntegerEnv(env, 'CLASSIFIER_TIMEOUT_MS', 25_000),
    },
  };
};
