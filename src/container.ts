/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * Tests pass in-memory stores, mock providers and a buffering logger;
 * production wiring lives in container.production.ts.
 */

import type { QuestionCatalog } from './catalog/QuestionCatalog.js';
import type { IRatingsStore } from './stores/IRatingsStore.js';
import type { IHistoryStore } from './stores/IHistoryStore.js';
import type { ILlmProvider } from './providers/ILlmProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { IExportWriter } from './export/IExportWriter.js';
import type { Middleware } from './middleware/pipeline.js';
import type { AppConfig } from './config.js';
import { AssessmentService } from './services/AssessmentService.js';
import { RecommendationService } from './services/RecommendationService.js';
import { ExportService } from './services/ExportService.js';
import { createLoggingMiddleware } from './middleware/logging.js';

export interface Container {
  config: AppConfig;
  assessmentService: AssessmentService;
  recommendationService: RecommendationService;
  exportService: ExportService;
  logProvider: ILogProvider;
  logging: Middleware;
}

export function createContainer(deps: {
  config: AppConfig;
  catalog: QuestionCatalog;
  ratingsStore: IRatingsStore;
  historyStore: IHistoryStore;
  llmProviders: readonly ILlmProvider[];
  exportWriter: IExportWriter;
  logProvider: ILogProvider;
}): Container {
  const assessmentService = new AssessmentService(
    deps.ratingsStore,
    deps.historyStore,
    deps.catalog,
    deps.logProvider,
    deps.config.topActionsLimit
  );
  const recommendationService = new RecommendationService(
    deps.llmProviders,
    deps.logProvider,
    deps.config.promptItemLimit
  );
  const exportService = new ExportService(assessmentService, deps.exportWriter, deps.logProvider);
  const logging = createLoggingMiddleware(deps.logProvider);

  return {
    config: deps.config,
    assessmentService,
    recommendationService,
    exportService,
    logProvider: deps.logProvider,
    logging,
  };
}
