import { ClassifierBackendPort } from '../../application/ports/ClassifierBackendPort.js';
import { CategoryProviderPort } from '../../application/ports/CategoryProviderPort.js';
import { FormatExtractorPort } from '../../application/ports/FormatExtractorPort.js';
import { StoragePort } from '../../application/ports/StoragePort.js';
import { AggregationService } from '../../application/services/AggregationService.js';
import { AnalysisJobService } from '../../application/services/AnalysisJobService.js';
import { AnomalyDetectionService } from '../../application/services/AnomalyDetectionService.js';
import { CategorizationEngine } from '../../application/services/CategorizationEngine.js';
import { ExtractionService } from '../../application/services/ExtractionService.js';
import { NormalizationService } from '../../application/services/NormalizationService.js';
import { ResultExportService } from '../../application/services/ResultExportService.js';
import { CategoryCatalog } from '../../domain/entities/Category.js';
import { loadCategoryCatalog } from '../adapters/categorizer/CategoryCatalog.js';
import { ClassifierCategoryProvider } from '../adapters/categorizer/ClassifierCategoryProvider.js';
import { RuleBasedCategorizer } from '../adapters/categorizer/RuleBasedCategorizer.js';
import { OpenRouterClassifierBackend } from '../adapters/classifier/OpenRouterClassifierBackend.js';
import { CsvFormatExtractor } from '../adapters/extractor/CsvFormatExtractor.js';
import { PdfFormatExtractor } from '../adapters/extractor/PdfFormatExtractor.js';
import { SpreadsheetFormatExtractor } from '../adapters/extractor/SpreadsheetFormatExtractor.js';
import { InMemoryObjectStorage } from '../adapters/storage/InMemoryObjectStorage.js';
import { InMemoryStorageAdapter } from '../adapters/storage/InMemoryStorageAdapter.js';
import { AppConfig, loadConfig } from '../config/Config.js';
import { logger } from '../logging/Logger.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  extractors?: FormatExtractorPort[];
  storage?: StoragePort;
  objectStorage?: InMemoryObjectStorage;
  catalog?: CategoryCatalog;
  classifier?: ClassifierBackendPort | null;
}

export class AppContainer {
  readonly config: AppConfig;

  readonly storage: StoragePort;
  readonly objectStorage: InMemoryObjectStorage;
  readonly catalog: CategoryCatalog;
  readonly classifier: ClassifierBackendPort | null;
  readonly categorization: CategorizationEngine;
  readonly jobService: AnalysisJobService;
  readonly exportService: ResultExportService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.storage = overrides.storage ?? new InMemoryStorageAdapter();
    this.objectStorage = overrides.objectStorage ?? new InMemoryObjectStorage();
    this.catalog = overrides.catalog ?? loadCategoryCatalog(this.config.categorization.catalogPath);

    if (overrides.classifier !== undefined) {
      this.classifier = overrides.classifier;
    } else if (this.config.classifier.enabled) {
      this.classifier = OpenRouterClassifierBackend.fromConfig(
        this.config.classifier,
        this.catalog.categories.map((category) => category.label),
      );
    } else {
      this.classifier = null;
    }

    const providers: CategoryProviderPort[] = [new RuleBasedCategorizer(this.catalog)];
    if (this.classifier) {
      providers.push(new ClassifierCategoryProvider(this.classifier));
    }
    this.categorization = new CategorizationEngine(providers, this.catalog, this.config.categorization);

    const extractors = overrides.extractors ?? [
      new PdfFormatExtractor(),
      new CsvFormatExtractor(),
      new SpreadsheetFormatExtractor(),
    ];

    const { pipeline } = this.config;
    this.jobService = new AnalysisJobService({
      storage: this.storage,
      objectStorage: this.objectStorage,
      extraction: new ExtractionService(extractors),
      normalization: new NormalizationService(),
      categorization: this.categorization,
      anomalies: new AnomalyDetectionService(this.config.anomaly),
      aggregation: new AggregationService(this.config.app.defaultCurrency),
      settings: {
        workerConcurrency: pipeline.workerConcurrency,
        headerScanWindow: pipeline.headerScanWindow,
        stageTimeoutsMs: pipeline.stageTimeoutsMs,
        retry: pipeline.retry,
        staleJobAgeMs: pipeline.staleJobAgeMs,
        defaultCurrency: this.config.app.defaultCurrency,
      },
    });
    this.exportService = new ResultExportService();

    logger.debug(
      { categories: this.catalog.size, classifier: this.classifier !== null, workers: pipeline.workerConcurrency },
      'container ready',
    );
  }

  hasClassifier(): boolean {
    return this.classifier !== null;
  }
}
