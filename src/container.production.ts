/**
 * Production container: real LLM providers, JSON exports on disk,
 * Axiom logging when configured. Sessions live in memory for the life
 * of the process.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig } from './config.js';
import { loadDefaultCatalog } from './catalog/QuestionCatalog.js';
import { InMemoryRatingsStore } from './stores/InMemoryRatingsStore.js';
import { InMemoryHistoryStore } from './stores/InMemoryHistoryStore.js';
import { LlamaCppProvider } from './providers/LlamaCppProvider.js';
import { OllamaProvider } from './providers/OllamaProvider.js';
import { OpenAIChatProvider } from './providers/OpenAIChatProvider.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { JsonWorkbookWriter } from './export/JsonWorkbookWriter.js';

let cached: Container | null = null;

export function getProductionContainer(env: Record<string, string | undefined> = process.env): Container {
  if (cached) return cached;

  const config = loadConfig(env);

  // Axiom logging when configured, console otherwise
  const logProvider = config.axiom
    ? new AxiomLogProvider({ apiToken: config.axiom.apiToken, dataset: config.axiom.dataset })
    : new ConsoleLogProvider({ outputToConsole: true, minLevel: 'info', maxEvents: 200 });

  cached = createContainer({
    config,
    catalog: loadDefaultCatalog(),
    ratingsStore: new InMemoryRatingsStore(),
    historyStore: new InMemoryHistoryStore(),
    llmProviders: [
      new LlamaCppProvider(),
      new OllamaProvider({ mode: config.llm.ollamaMode }),
      new OpenAIChatProvider({ env }),
    ],
    exportWriter: new JsonWorkbookWriter(config.exportDir),
    logProvider,
  });

  logProvider.info('Container ready', {
    defaultProvider: config.llm.defaultProvider,
    ollamaMode: config.llm.ollamaMode,
    exportDir: config.exportDir,
  });

  return cached;
}
