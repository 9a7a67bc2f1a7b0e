/**
 * OpenAI-compatible /v1/chat/completions transport over native fetch.
 * Shared by the llama.cpp provider and the Ollama HTTP path.
 *
 * Transport failures are classified from the error structure
 * (abort reason, undici cause codes), never from message text.
 */

import type { ProviderKind } from '../types/models.js';
import { failure, success, REQUEST_TIMEOUT_MS, type LlmResult } from './ILlmProvider.js';
import {
  connectionRefusedMessage,
  httpErrorMessage,
  malformedResponseMessage,
  serverBusyMessage,
  timeoutMessage,
} from './remediation.js';

export const CHAT_COMPLETIONS_PATH = '/v1/chat/completions';

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_SOCKET',
]);

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

export type TransportFailure = 'timeout' | 'connection';

export interface ChatCompletionCall {
  provider: ProviderKind;
  /** Server root, e.g. http://localhost:8080 (trailing slashes tolerated). */
  baseUrl: string;
  model: string;
  body: Record<string, unknown>;
  /** Report HTTP 503 as ServerBusy instead of a plain HttpError. */
  busyOn503?: boolean;
  timeoutMs?: number;
}

export function chatCompletionsUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${CHAT_COMPLETIONS_PATH}`;
}

export async function postChatCompletion(call: ChatCompletionCall): Promise<LlmResult> {
  const url = chatCompletionsUrl(call.baseUrl);
  const timeoutMs = call.timeoutMs ?? REQUEST_TIMEOUT_MS;
  const root = call.baseUrl.replace(/\/+$/, '');

  let res: Response;
  let raw: string;

  try {
    res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(call.body),
      signal: AbortSignal.timeout(timeoutMs),
    });
    raw = await res.text();
  } catch (err) {
    if (classifyTransportError(err) === 'timeout') {
      return failure({ kind: 'Timeout', message: timeoutMessage(call.provider, timeoutMs) });
    }
    return failure({
      kind: 'ConnectionRefused',
      url: root,
      message: connectionRefusedMessage(call.provider, root, call.model, describeError(err)),
    });
  }

  if (!res.ok) {
    if (res.status === 503 && call.busyOn503) {
      return failure({ kind: 'ServerBusy', message: serverBusyMessage() });
    }
    return failure({
      kind: 'HttpError',
      status: res.status,
      body: raw,
      message: httpErrorMessage(call.provider, res.status, raw),
    });
  }

  const payload = parseJson(raw);
  const content = extractMessageContent(payload);
  if (content !== undefined) {
    return success(content);
  }

  const envelope = extractErrorMessage(payload);
  if (envelope !== undefined) {
    return failure({
      kind: 'HttpError',
      status: res.status,
      body: envelope,
      message: httpErrorMessage(call.provider, res.status, envelope),
    });
  }

  return failure({ kind: 'MalformedResponse', message: malformedResponseMessage(call.provider) });
}

/** Timeout, connection-level failure, or null when the error is neither. */
export function classifyTransportError(err: unknown): TransportFailure | null {
  if (!(err instanceof Error)) return null;

  // AbortSignal.timeout() rejects with a DOMException named TimeoutError
  if (err.name === 'TimeoutError' || err.name === 'AbortError') return 'timeout';

  const code = errorCode(err.cause) ?? errorCode(err);
  if (code === undefined) return null;
  if (TIMEOUT_CODES.has(code)) return 'timeout';
  if (CONNECTION_CODES.has(code)) return 'connection';
  return null;
}

function errorCode(value: unknown): string | undefined {
  if (value instanceof AggregateError) {
    for (const inner of value.errors) {
      const code = errorCode(inner);
      if (code !== undefined) return code;
    }
  }
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

function describeError(err: unknown): string | undefined {
  if (!(err instanceof Error)) return undefined;
  const code = errorCode(err.cause);
  return code ? `${err.message} (${code})` : err.message;
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `choices[0].message.content` when it is a string. */
export function extractMessageContent(payload: unknown): string | undefined {
  if (!isRecord(payload) || !Array.isArray(payload.choices)) return undefined;
  const first: unknown = payload.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return undefined;
  const content = first.message.content;
  return typeof content === 'string' ? content : undefined;
}

/** `error.message` of a 2xx error envelope. */
export function extractErrorMessage(payload: unknown): string | undefined {
  if (!isRecord(payload) || !isRecord(payload.error)) return undefined;
  const message = payload.error.message;
  return typeof message === 'string' ? message : undefined;
}
