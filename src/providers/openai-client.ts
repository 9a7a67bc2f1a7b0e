/**
 * Thin seam over the openai SDK's chat completions API.
 * Used by the OpenAI provider and by the Ollama provider's client mode,
 * so both share one error classification.
 */

import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai';
import type { ProviderKind } from '../types/models.js';
import { failure, success, REQUEST_TIMEOUT_MS, type ChatPrompt, type LlmResult } from './ILlmProvider.js';
import {
  connectionRefusedMessage,
  httpErrorMessage,
  malformedResponseMessage,
  timeoutMessage,
} from './remediation.js';
import { extractErrorMessage, extractMessageContent } from './chat-completions.js';

// The SDK does not surface the status of a successful response
const SUCCESS_STATUS = 200;

/**
 * The subset of the SDK client the providers call. The completion is
 * typed `unknown`: compatible servers do not always honour the schema.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: Array<{ role: 'system' | 'user'; content: string }>;
        temperature?: number;
        max_tokens?: number;
        stream?: false;
      }): Promise<unknown>;
    };
  };
}

export interface ChatClientOptions {
  apiKey: string;
  baseURL?: string;
  timeoutMs: number;
}

export type ChatClientFactory = (opts: ChatClientOptions) => ChatCompletionsClient;

/** SDK retries are disabled: every failure goes straight back to the caller. */
export const createOpenAIClient: ChatClientFactory = (opts) =>
  new OpenAI({
    apiKey: opts.apiKey,
    baseURL: opts.baseURL,
    timeout: opts.timeoutMs,
    maxRetries: 0,
  });

export interface ClientChatCall {
  provider: ProviderKind;
  client: ChatCompletionsClient;
  model: string;
  prompt: ChatPrompt;
  temperature?: number;
  /** Shown in connection failures. */
  displayUrl: string;
  timeoutMs?: number;
}

export async function sendViaClient(call: ClientChatCall): Promise<LlmResult> {
  let completion: unknown;
  try {
    completion = await call.client.chat.completions.create({
      model: call.model,
      messages: [
        { role: 'system', content: call.prompt.system },
        { role: 'user', content: call.prompt.user },
      ],
      ...(call.temperature !== undefined && { temperature: call.temperature }),
      stream: false,
    });
  } catch (err) {
    return classifyClientError(err, call);
  }

  const content = extractMessageContent(completion);
  if (content !== undefined) {
    return success(content);
  }

  const envelope = extractErrorMessage(completion);
  if (envelope !== undefined) {
    return failure({
      kind: 'HttpError',
      status: SUCCESS_STATUS,
      body: envelope,
      message: httpErrorMessage(call.provider, SUCCESS_STATUS, envelope),
    });
  }

  return failure({ kind: 'MalformedResponse', message: malformedResponseMessage(call.provider) });
}

function classifyClientError(err: unknown, call: ClientChatCall): LlmResult {
  // Subclass order matters: timeout extends connection extends APIError
  if (err instanceof APIConnectionTimeoutError) {
    return failure({
      kind: 'Timeout',
      message: timeoutMessage(call.provider, call.timeoutMs ?? REQUEST_TIMEOUT_MS),
    });
  }
  if (err instanceof APIConnectionError) {
    return failure({
      kind: 'ConnectionRefused',
      url: call.displayUrl,
      message: connectionRefusedMessage(call.provider, call.displayUrl, call.model, err.message),
    });
  }
  if (err instanceof APIError && err.status !== undefined) {
    const body = err.error !== undefined ? JSON.stringify(err.error) : err.message;
    return failure({
      kind: 'HttpError',
      status: err.status,
      body,
      message: httpErrorMessage(call.provider, err.status, body),
    });
  }

  const detail = err instanceof Error ? err.message : String(err);
  return failure({
    kind: 'ConnectionRefused',
    url: call.displayUrl,
    message: connectionRefusedMessage(call.provider, call.displayUrl, call.model, detail),
  });
}
