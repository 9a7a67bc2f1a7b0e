import { describe, it, expect } from 'vitest';
import { APIError } from 'openai';
import { OpenAIChatProvider, resolveApiKey } from '../../src/providers/OpenAIChatProvider.js';
import type { ProviderConfig } from '../../src/types/models.js';
import { FakeChatClient, completion, fakeFactory } from '../mocks/FakeChatClient.js';

const PROMPT = { system: 'You advise.', user: 'Close the gaps.' };
const CONFIG: ProviderConfig = { provider: 'openai', model: 'gpt-4', baseUrl: '' };

describe('OpenAIChatProvider', () => {
  it('should fail with MissingCredential before building a client', async () => {
    const client = new FakeChatClient(async () => completion('unused'));
    const { factory, options } = fakeFactory(client);
    const provider = new OpenAIChatProvider({ clientFactory: factory, env: {} });

    const result = await provider.send(PROMPT, CONFIG);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'MissingCredential',
        message: 'OpenAI API key not provided. Enter a key or set the OPENAI_API_KEY environment variable.',
      },
    });
    expect(options).toHaveLength(0);
    expect(client.requests).toHaveLength(0);
  });

  it('should use the environment key when none is given', async () => {
    const { factory, options } = fakeFactory(new FakeChatClient(async () => completion('Hello')));
    const provider = new OpenAIChatProvider({ clientFactory: factory, env: { OPENAI_API_KEY: 'test-env-key' } });

    expect(await provider.send(PROMPT, CONFIG)).toEqual({ ok: true, text: 'Hello' });
    expect(options).toEqual([{ apiKey: 'test-env-key', baseURL: undefined, timeoutMs: 120_000 }]);
  });

  it('should prefer an explicit key and pass a custom base URL', async () => {
    const { factory, options } = fakeFactory(new FakeChatClient(async () => completion('Hello')));
    const provider = new OpenAIChatProvider({ clientFactory: factory, env: { OPENAI_API_KEY: 'test-env-key' } });

    await provider.send(PROMPT, { ...CONFIG, apiKey: 'test-secret', baseUrl: 'https://proxy.internal/v1' });

    expect(options[0]).toMatchObject({ apiKey: 'test-secret', baseURL: 'https://proxy.internal/v1' });
  });

  it('should send no temperature override', async () => {
    const client = new FakeChatClient(async () => completion('Hello'));
    const provider = new OpenAIChatProvider({ clientFactory: fakeFactory(client).factory, env: { OPENAI_API_KEY: 'k' } });

    await provider.send(PROMPT, CONFIG);

    expect(client.requests[0]).toEqual({
      model: 'gpt-4',
      messages: [
        { role: 'system', content: 'You advise.' },
        { role: 'user', content: 'Close the gaps.' },
      ],
      stream: false,
    });
  });

  it('should report empty content as MalformedResponse', async () => {
    const provider = new OpenAIChatProvider({
      clientFactory: fakeFactory(new FakeChatClient(async () => completion(null))).factory,
      env: { OPENAI_API_KEY: 'k' },
    });

    expect(await provider.send(PROMPT, CONFIG)).toMatchObject({ ok: false, error: { kind: 'MalformedResponse' } });
  });

  it('should report a completion without choices as MalformedResponse', async () => {
    const provider = new OpenAIChatProvider({
      clientFactory: fakeFactory(new FakeChatClient(async () => ({}))).factory,
      env: { OPENAI_API_KEY: 'k' },
    });

    expect(await provider.send(PROMPT, CONFIG)).toEqual({
      ok: false,
      error: {
        kind: 'MalformedResponse',
        message: 'Unexpected response format from OpenAI API: no choices[0].message.content in the body.',
      },
    });
  });

  it('should report a choice without a message as MalformedResponse', async () => {
    const provider = new OpenAIChatProvider({
      clientFactory: fakeFactory(new FakeChatClient(async () => ({ choices: [{}] }))).factory,
      env: { OPENAI_API_KEY: 'k' },
    });

    expect(await provider.send(PROMPT, CONFIG)).toMatchObject({ ok: false, error: { kind: 'MalformedResponse' } });
  });

  it('should report an error envelope in a successful response as HttpError', async () => {
    const provider = new OpenAIChatProvider({
      clientFactory: fakeFactory(
        new FakeChatClient(async () => ({ error: { message: 'model not loaded' } }))
      ).factory,
      env: { OPENAI_API_KEY: 'k' },
    });

    expect(await provider.send(PROMPT, CONFIG)).toEqual({
      ok: false,
      error: {
        kind: 'HttpError',
        status: 200,
        body: 'model not loaded',
        message: 'HTTP 200 error from OpenAI API:\nmodel not loaded',
      },
    });
  });

  it('should report API status errors as HttpError', async () => {
    const client = new FakeChatClient(async () => {
      throw new APIError(401, { message: 'Incorrect API key provided' }, 'Incorrect API key provided', undefined);
    });
    const provider = new OpenAIChatProvider({ clientFactory: fakeFactory(client).factory, env: { OPENAI_API_KEY: 'k' } });

    const result = await provider.send(PROMPT, CONFIG);

    expect(result).toMatchObject({ ok: false, error: { kind: 'HttpError', status: 401 } });
    if (result.ok) return;
    expect(result.error.message).toBe('HTTP 401 error from OpenAI API:\n{"message":"Incorrect API key provided"}');
  });

  it('should report unclassified errors as ConnectionRefused against the API URL', async () => {
    const client = new FakeChatClient(async () => {
      throw new Error('socket hang up');
    });
    const provider = new OpenAIChatProvider({ clientFactory: fakeFactory(client).factory, env: { OPENAI_API_KEY: 'k' } });

    const result = await provider.send(PROMPT, CONFIG);

    expect(result).toMatchObject({ ok: false, error: { kind: 'ConnectionRefused', url: 'https://api.openai.com/v1' } });
    if (result.ok) return;
    expect(result.error.message).toContain('Underlying error: socket hang up');
  });
});

describe('resolveApiKey', () => {
  it('should take the explicit key first', () => {
    expect(resolveApiKey('test-secret', { OPENAI_API_KEY: 'test-env-key' })).toBe('test-secret');
  });

  it('should treat a blank explicit key as absent', () => {
    expect(resolveApiKey('   ', { OPENAI_API_KEY: 'test-env-key' })).toBe('test-env-key');
  });

  it('should return null when neither is set', () => {
    expect(resolveApiKey(undefined, { OPENAI_API_KEY: '' })).toBeNull();
  });
});
