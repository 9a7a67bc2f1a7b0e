/**
 * llama.cpp provider.
 * Talks to llama-server's OpenAI-compatible endpoint. No auth, no SDK.
 */

import type { ProviderConfig } from '../types/models.js';
import type { ChatPrompt, ILlmProvider, LlmResult } from './ILlmProvider.js';
import { SAMPLING_TEMPERATURE } from './ILlmProvider.js';
import { postChatCompletion } from './chat-completions.js';

export const LLAMA_CPP_DEFAULT_BASE_URL = 'http://localhost:8080';
export const LLAMA_CPP_DEFAULT_MODEL = 'local-model';
const MAX_TOKENS = 2048;

export class LlamaCppProvider implements ILlmProvider {
  readonly kind = 'llama_cpp' as const;
  private readonly maxTokens: number;
  private readonly timeoutMs?: number;

  constructor(opts?: { maxTokens?: number; timeoutMs?: number }) {
    this.maxTokens = opts?.maxTokens ?? MAX_TOKENS;
    this.timeoutMs = opts?.timeoutMs;
  }

  async send(prompt: ChatPrompt, config: ProviderConfig): Promise<LlmResult> {
    // llama-server serves whatever model it was started with, so no model field
    return postChatCompletion({
      provider: this.kind,
      baseUrl: config.baseUrl || LLAMA_CPP_DEFAULT_BASE_URL,
      model: config.model,
      body: {
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        temperature: SAMPLING_TEMPERATURE,
        max_tokens: this.maxTokens,
        stream: false,
      },
      busyOn503: true,
      timeoutMs: this.timeoutMs,
    });
  }
}
