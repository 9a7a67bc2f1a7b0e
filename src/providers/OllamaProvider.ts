/**
 * Ollama provider.
 * Two paths against the same server:
 *   - 'http':   plain fetch against Ollama's OpenAI-compatible endpoint
 *   - 'client': the openai SDK pointed at {baseUrl}/v1
 * Both report through the same LlmResult contract.
 */

import type { ProviderConfig } from '../types/models.js';
import type { ChatPrompt, ILlmProvider, LlmResult } from './ILlmProvider.js';
import { REQUEST_TIMEOUT_MS, SAMPLING_TEMPERATURE } from './ILlmProvider.js';
import { postChatCompletion } from './chat-completions.js';
import { createOpenAIClient, sendViaClient, type ChatClientFactory } from './openai-client.js';

export const OLLAMA_DEFAULT_BASE_URL = 'http://localhost:11434';
export const OLLAMA_DEFAULT_MODEL = 'llama3.1:8b';

export type OllamaMode = 'http' | 'client';

export const OLLAMA_MODES: readonly OllamaMode[] = ['http', 'client'];

// Ollama ignores the key, but the SDK refuses to start without one
const PLACEHOLDER_API_KEY = 'ollama';

export class OllamaProvider implements ILlmProvider {
  readonly kind = 'ollama' as const;
  readonly mode: OllamaMode;
  private readonly clientFactory: ChatClientFactory;
  private readonly timeoutMs?: number;

  constructor(opts?: { mode?: OllamaMode; clientFactory?: ChatClientFactory; timeoutMs?: number }) {
    this.mode = opts?.mode ?? 'http';
    this.clientFactory = opts?.clientFactory ?? createOpenAIClient;
    this.timeoutMs = opts?.timeoutMs;
  }

  async send(prompt: ChatPrompt, config: ProviderConfig): Promise<LlmResult> {
    const baseUrl = (config.baseUrl || OLLAMA_DEFAULT_BASE_URL).replace(/\/+$/, '');

    if (this.mode === 'client') {
      const client = this.clientFactory({
        apiKey: PLACEHOLDER_API_KEY,
        baseURL: `${baseUrl}/v1`,
        timeoutMs: this.timeoutMs ?? REQUEST_TIMEOUT_MS,
      });
      return sendViaClient({
        provider: this.kind,
        client,
        model: config.model,
        prompt,
        temperature: SAMPLING_TEMPERATURE,
        displayUrl: baseUrl,
        timeoutMs: this.timeoutMs,
      });
    }

    return postChatCompletion({
      provider: this.kind,
      baseUrl,
      model: config.model,
      body: {
        model: config.model,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        temperature: SAMPLING_TEMPERATURE,
        stream: false,
      },
      timeoutMs: this.timeoutMs,
    });
  }
}
