/**
 * Environment configuration.
 * Read once at startup; invalid values fail fast with ConfigError.
 */

import type { ProviderConfig, ProviderKind } from './types/models.js';
import { PROVIDER_KINDS, isProviderKind } from './types/models.js';
import type { ProviderRequest } from './types/api.js';
import { ConfigError } from './errors.js';
import type { LlmFailure } from './providers/ILlmProvider.js';
import { unsupportedProviderMessage } from './providers/remediation.js';
import { LLAMA_CPP_DEFAULT_BASE_URL, LLAMA_CPP_DEFAULT_MODEL } from './providers/LlamaCppProvider.js';
import {
  OLLAMA_DEFAULT_BASE_URL,
  OLLAMA_DEFAULT_MODEL,
  OLLAMA_MODES,
  type OllamaMode,
} from './providers/OllamaProvider.js';
import { OPENAI_DEFAULT_MODEL } from './providers/OpenAIChatProvider.js';

type Env = Record<string, string | undefined>;

export interface ProviderDefaults {
  model: string;
  baseUrl: string;
}

export interface AppConfig {
  llm: {
    defaultProvider: ProviderKind;
    ollamaMode: OllamaMode;
    providers: Record<ProviderKind, ProviderDefaults>;
  };
  exportDir: string;
  topActionsLimit: number;
  promptItemLimit: number;
  axiom: { apiToken: string; dataset: string } | null;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const defaultProvider = env.LLM_PROVIDER?.trim() || 'llama_cpp';
  if (!isProviderKind(defaultProvider)) {
    throw new ConfigError(
      'LLM_PROVIDER',
      `LLM_PROVIDER must be one of: ${PROVIDER_KINDS.join(', ')} (got "${defaultProvider}")`
    );
  }

  const ollamaMode = env.OLLAMA_MODE?.trim() || 'http';
  if (!isOllamaMode(ollamaMode)) {
    throw new ConfigError('OLLAMA_MODE', `OLLAMA_MODE must be one of: ${OLLAMA_MODES.join(', ')}`);
  }

  const axiomToken = env.AXIOM_API_KEY?.trim();
  const axiomDataset = env.AXIOM_DATASET?.trim();

  return {
    llm: {
      defaultProvider,
      ollamaMode,
      providers: {
        llama_cpp: {
          model: env.LLAMA_CPP_MODEL?.trim() || LLAMA_CPP_DEFAULT_MODEL,
          baseUrl: env.LLAMA_CPP_BASE_URL?.trim() || LLAMA_CPP_DEFAULT_BASE_URL,
        },
        ollama: {
          model: env.OLLAMA_MODEL?.trim() || OLLAMA_DEFAULT_MODEL,
          baseUrl: env.OLLAMA_BASE_URL?.trim() || OLLAMA_DEFAULT_BASE_URL,
        },
        // Empty base URL lets the SDK use its own endpoint
        openai: {
          model: env.OPENAI_MODEL?.trim() || OPENAI_DEFAULT_MODEL,
          baseUrl: env.OPENAI_BASE_URL?.trim() || '',
        },
      },
    },
    exportDir: env.EXPORT_DIR?.trim() || './exports',
    topActionsLimit: positiveInt(env, 'TOP_ACTIONS_LIMIT', 5),
    promptItemLimit: positiveInt(env, 'PROMPT_ITEM_LIMIT', 10),
    axiom: axiomToken && axiomDataset ? { apiToken: axiomToken, dataset: axiomDataset } : null,
  };
}

/**
 * Merge a client's provider selection over the configured defaults.
 * The API key is passed through untouched; the OpenAI provider resolves
 * it against the environment when absent.
 */
export function resolveProviderConfig(
  request: ProviderRequest,
  config: AppConfig
): { ok: true; config: ProviderConfig } | { ok: false; error: LlmFailure } {
  const provider = request.provider?.trim() || config.llm.defaultProvider;

  if (!isProviderKind(provider)) {
    return {
      ok: false,
      error: {
        kind: 'UnsupportedProvider',
        provider,
        message: unsupportedProviderMessage(provider, PROVIDER_KINDS),
      },
    };
  }

  const defaults = config.llm.providers[provider];
  return {
    ok: true,
    config: {
      provider,
      model: request.model?.trim() || defaults.model,
      baseUrl: request.baseUrl?.trim() || defaults.baseUrl,
      ...(request.apiKey ? { apiKey: request.apiKey } : {}),
    },
  };
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(name, `${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

function isOllamaMode(value: string): value is OllamaMode {
  return OLLAMA_MODES.some((m) => m === value);
}
