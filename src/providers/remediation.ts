/**
 * Provider-specific remediation text attached to LLM failures.
 */

import type { ProviderKind } from '../types/models.js';

const LABELS: Record<ProviderKind, string> = {
  llama_cpp: 'llama.cpp server',
  ollama: 'Ollama server',
  openai: 'OpenAI API',
};

export function connectionRefusedMessage(
  provider: ProviderKind,
  url: string,
  model: string,
  detail?: string
): string {
  const suffix = detail ? `\n\nUnderlying error: ${detail}` : '';

  switch (provider) {
    case 'llama_cpp':
      return (
        `Cannot connect to llama.cpp server at ${url}\n\n` +
        'Make sure llama-server is running:\n' +
        '1. Start the server: ./llama-server -m /path/to/model.gguf --port 8080\n' +
        `2. Verify the server is accessible at ${url}/health` +
        suffix
      );
    case 'ollama':
      return (
        `Cannot connect to Ollama server at ${url}\n\n` +
        'Make sure Ollama is running:\n' +
        '1. Install Ollama: https://ollama.com\n' +
        "2. Start the server: 'ollama serve'\n" +
        `3. Pull the model: 'ollama pull ${model}'` +
        suffix
      );
    case 'openai':
      return (
        `Cannot reach the OpenAI API at ${url}\n\n` +
        'Check network access and any proxy settings, then try again.' +
        suffix
      );
  }
}

export function serverBusyMessage(): string {
  return (
    'llama.cpp server is busy (503). The server may be:\n' +
    '- Still loading the model\n' +
    '- Processing another request\n\n' +
    'Try again in a moment.'
  );
}

export function timeoutMessage(provider: ProviderKind, timeoutMs: number): string {
  return (
    `Request to ${LABELS[provider]} timed out after ${Math.round(timeoutMs / 1000)}s.\n\n` +
    'The model may be generating a long response. Try:\n' +
    '- Reducing max_tokens\n' +
    '- Using a smaller/faster model\n' +
    '- Checking server load'
  );
}

export function httpErrorMessage(provider: ProviderKind, status: number, body: string): string {
  return `HTTP ${status} error from ${LABELS[provider]}:\n${body}`;
}

export function malformedResponseMessage(provider: ProviderKind): string {
  return `Unexpected response format from ${LABELS[provider]}: no choices[0].message.content in the body.`;
}

export function missingCredentialMessage(envVar: string): string {
  return `OpenAI API key not provided. Enter a key or set the ${envVar} environment variable.`;
}

export function unsupportedProviderMessage(provider: string, supported: readonly string[]): string {
  return `Unknown provider: ${provider}. Supported providers: ${supported.join(', ')}.`;
}
