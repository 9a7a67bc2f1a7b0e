import { describe, it, expect } from 'vitest';
import {
  chatCompletionsUrl,
  classifyTransportError,
  extractErrorMessage,
  extractMessageContent,
} from '../../src/providers/chat-completions.js';

function withCause(code: string): Error {
  return new TypeError('fetch failed', { cause: { code } });
}

describe('classifyTransportError', () => {
  it('should read abort and timeout error names as timeouts', () => {
    const timeout = new Error('timed out');
    timeout.name = 'TimeoutError';
    const abort = new Error('aborted');
    abort.name = 'AbortError';

    expect(classifyTransportError(timeout)).toBe('timeout');
    expect(classifyTransportError(abort)).toBe('timeout');
  });

  it('should read connection failures from the cause code', () => {
    expect(classifyTransportError(withCause('ECONNREFUSED'))).toBe('connection');
    expect(classifyTransportError(withCause('ENOTFOUND'))).toBe('connection');
    expect(classifyTransportError(withCause('UND_ERR_CONNECT_TIMEOUT'))).toBe('timeout');
  });

  it('should look inside aggregate causes', () => {
    const err = new TypeError('fetch failed', {
      cause: new AggregateError([new Error('v6'), withCause('ECONNREFUSED').cause]),
    });

    expect(classifyTransportError(err)).toBe('connection');
  });

  it('should not guess from message text', () => {
    expect(classifyTransportError(new Error('connection refused'))).toBeNull();
    expect(classifyTransportError('ECONNREFUSED')).toBeNull();
  });
});

describe('chatCompletionsUrl', () => {
  it('should join the path onto the server root', () => {
    expect(chatCompletionsUrl('http://localhost:8080')).toBe('http://localhost:8080/v1/chat/completions');
    expect(chatCompletionsUrl('http://localhost:8080//')).toBe('http://localhost:8080/v1/chat/completions');
  });
});

describe('extractMessageContent', () => {
  it('should read choices[0].message.content', () => {
    expect(extractMessageContent({ choices: [{ message: { content: 'X' } }] })).toBe('X');
  });

  it('should return undefined for anything else', () => {
    expect(extractMessageContent({ choices: [] })).toBeUndefined();
    expect(extractMessageContent({ choices: [{ message: { content: null } }] })).toBeUndefined();
    expect(extractMessageContent(undefined)).toBeUndefined();
  });
});

describe('extractErrorMessage', () => {
  it('should read error.message', () => {
    expect(extractErrorMessage({ error: { message: 'bad model' } })).toBe('bad model');
    expect(extractErrorMessage({ error: 'bad model' })).toBeUndefined();
  });
});
