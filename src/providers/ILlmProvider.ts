/**
 * Chat-completion provider interface.
 * Each backend (llama.cpp, Ollama, OpenAI) is one implementation.
 * Providers never throw: every outcome, failures included, is an LlmResult.
 */

import type { ProviderConfig, ProviderKind } from '../types/models.js';

/** Wall-clock budget for a single completion request. */
export const REQUEST_TIMEOUT_MS = 120_000;

export const SAMPLING_TEMPERATURE = 0.7;

export interface ChatPrompt {
  system: string;
  user: string;
}

export type LlmFailure =
  | { kind: 'ConnectionRefused'; message: string; url: string }
  | { kind: 'ServerBusy'; message: string }
  | { kind: 'Timeout'; message: string }
  | { kind: 'HttpError'; message: string; status: number; body: string }
  | { kind: 'MissingCredential'; message: string }
  | { kind: 'UnsupportedProvider'; message: string; provider: string }
  | { kind: 'MalformedResponse'; message: string };

export type LlmResult =
  | { ok: true; text: string }
  | { ok: false; error: LlmFailure };

export interface ILlmProvider {
  readonly kind: ProviderKind;

  /** Send a single-turn prompt. Resolves with a result, never rejects. */
  send(prompt: ChatPrompt, config: ProviderConfig): Promise<LlmResult>;
}

export function success(text: string): LlmResult {
  return { ok: true, text };
}

export function failure(error: LlmFailure): LlmResult {
  return { ok: false, error };
}
