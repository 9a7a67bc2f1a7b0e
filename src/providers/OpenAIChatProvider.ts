/**
 * OpenAI chat provider.
 * Wraps the OpenAI API for chat completions (gpt-4 by default).
 * Key resolution: explicit config value, then OPENAI_API_KEY, then MissingCredential.
 */

import type { ProviderConfig } from '../types/models.js';
import type { ChatPrompt, ILlmProvider, LlmResult } from './ILlmProvider.js';
import { failure, REQUEST_TIMEOUT_MS } from './ILlmProvider.js';
import { createOpenAIClient, sendViaClient, type ChatClientFactory } from './openai-client.js';
import { missingCredentialMessage } from './remediation.js';

export const OPENAI_DEFAULT_MODEL = 'gpt-4';
export const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const OPENAI_API_KEY_ENV = 'OPENAI_API_KEY';

export class OpenAIChatProvider implements ILlmProvider {
  readonly kind = 'openai' as const;
  private readonly clientFactory: ChatClientFactory;
  private readonly env: Record<string, string | undefined>;
  private readonly timeoutMs: number;

  constructor(opts?: {
    clientFactory?: ChatClientFactory;
    env?: Record<string, string | undefined>;
    timeoutMs?: number;
  }) {
    this.clientFactory = opts?.clientFactory ?? createOpenAIClient;
    this.env = opts?.env ?? process.env;
    this.timeoutMs = opts?.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async send(prompt: ChatPrompt, config: ProviderConfig): Promise<LlmResult> {
    const apiKey = resolveApiKey(config.apiKey, this.env);
    if (apiKey === null) {
      return failure({ kind: 'MissingCredential', message: missingCredentialMessage(OPENAI_API_KEY_ENV) });
    }

    const baseURL = config.baseUrl || undefined;
    const client = this.clientFactory({ apiKey, baseURL, timeoutMs: this.timeoutMs });

    return sendViaClient({
      provider: this.kind,
      client,
      model: config.model,
      prompt,
      displayUrl: baseURL ?? OPENAI_DEFAULT_BASE_URL,
      timeoutMs: this.timeoutMs,
    });
  }
}

/** Explicit key first, then the environment. Blank values count as absent. */
export function resolveApiKey(
  explicit: string | undefined,
  env: Record<string, string | undefined>
): string | null {
  const fromParam = explicit?.trim();
  if (fromParam) return fromParam;
  const fromEnv = env[OPENAI_API_KEY_ENV]?.trim();
  if (fromEnv) return fromEnv;
  return null;
}
