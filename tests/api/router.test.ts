import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createRouter } from '../../src/api/router.js';
import type { HandlerContext } from '../../src/middleware/pipeline.js';
import { createTestContainer } from '../mocks/testContainer.js';
import { MockLlmProvider } from '../mocks/MockLlmProvider.js';
import type { MockExportWriter } from '../mocks/MockExportWriter.js';

const BASE = 'http://localhost/api/v1';

describe('API Router', () => {
  let handle: (req: Request, ctx: HandlerContext) => Promise<Response>;
  let llama: MockLlmProvider;
  let exportWriter: MockExportWriter;

  function ctx(): HandlerContext {
    return { requestId: null };
  }

  function get(path: string): Promise<Response> {
    return handle(new Request(`${BASE}${path}`, { method: 'GET' }), ctx());
  }

  function send(method: string, path: string, body?: unknown): Promise<Response> {
    return handle(
      new Request(`${BASE}${path}`, {
        method,
        headers: { 'Content-Type': 'application/json' },
        ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
      }),
      ctx()
    );
  }

  beforeEach(() => {
    llama = new MockLlmProvider('llama_cpp');
    const test = createTestContainer({ llmProviders: [llama] });
    exportWriter = test.exportWriter;
    handle = createRouter(test.container).handle;
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // --- catalog ---

  it('GET /questions returns domains and questions', async () => {
    const res = await get('/questions');
    expect(res.status).toBe(200);
    expect(res.headers.get('Cache-Control')).toBe('public, max-age=3600');
    expect(await res.json()).toMatchObject({
      domains: [{ id: 'd1' }, { id: 'd2' }],
      questions: [{ code: 'D 1.1' }, { code: 'D 1.2' }, { code: 'D 2.1' }],
    });
  });

  it('GET /domains returns per-domain averages', async () => {
    const res = await get('/domains');
    expect(await res.json()).toEqual({
      domains: [
        {
          domainId: 'd1',
          section: 'D 1',
          title: 'Domain One',
          avgCurrent: 1.5,
          avgTarget: 3,
          avgGap: 1.5,
          questions: 2,
          criticalHigh: 1,
        },
        {
          domainId: 'd2',
          section: 'D 2',
          title: 'Domain Two',
          avgCurrent: 2,
          avgTarget: 4,
          avgGap: 2,
          questions: 1,
          criticalHigh: 1,
        },
      ],
    });
  });

  // --- ratings ---

  it('GET /ratings/:code decodes the code', async () => {
    const res = await get('/ratings/D%201.1');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      code: 'D 1.1',
      current: 1,
      target: 4,
      actionItems: '',
      benefit: 1,
      effort: 1,
    });
  });

  it('GET /ratings/:code returns 404 for an unknown code', async () => {
    const res = await get('/ratings/D%209.9');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'NOT_FOUND', message: 'No question with code D 9.9' },
    });
  });

  it('GET /ratings/:code rejects a malformed escape with 400', async () => {
    const res = await get('/ratings/%E0');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: 'INVALID_REQUEST', message: 'Malformed path segment: %E0' },
    });
  });

  it('PATCH /ratings/:code updates one field', async () => {
    const res = await send('PATCH', '/ratings/D%201.1', { field: 'current', value: 3 });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ code: 'D 1.1', current: 3, target: 4 });

    const overview = await get('/overview');
    expect(await overview.json()).toMatchObject({ overallScore: 7 / 3 });
  });

  it('PATCH /ratings/:code rejects an unknown field', async () => {
    const res = await send('PATCH', '/ratings/D%201.1', { field: 'score', value: 3 });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: {
        code: 'INVALID_REQUEST',
        message: 'field must be one of: current, target, actionItems, benefit, effort',
      },
    });
  });

  it('PATCH /ratings/:code rejects an out-of-range level', async () => {
    const res = await send('PATCH', '/ratings/D%201.1', { field: 'current', value: 5 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: 'INVALID_REQUEST',
        message: 'current must be an integer from 0 to 4',
        details: { field: 'current' },
      },
    });
  });

  it('PATCH /ratings/:code returns 404 for an unknown code', async () => {
    const res = await send('PATCH', '/ratings/D%209.9', { field: 'current', value: 3 });
    expect(res.status).toBe(404);
  });

  // --- derived views ---

  it('GET /overview returns scores and priority counts', async () => {
    const res = await get('/overview');
    expect(await res.json()).toEqual({
      overallScore: 5 / 3,
      targetScore: 10 / 3,
      progressPercent: (5 / 3 / 4) * 100,
      questions: 3,
      criticalHigh: 2,
      priorities: { Critical: 1, High: 1, Medium: 0, Low: 1, Unknown: 0 },
      cycle: 1,
      lastSaved: null,
    });
  });

  it('GET /top-actions honours the limit parameter', async () => {
    const res = await get('/top-actions?limit=1');
    expect(await res.json()).toMatchObject({ items: [{ code: 'D 1.1', gap: 3, priority: 'Critical' }] });
  });

  it('GET /top-actions rejects a negative limit', async () => {
    const res = await get('/top-actions?limit=-1');
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { message: 'limit must be a non-negative integer' },
    });
  });

  it('GET /gaps lists every row by gap', async () => {
    const res = await get('/gaps');
    expect(await res.json()).toMatchObject({
      rows: [{ code: 'D 1.1' }, { code: 'D 2.1' }, { code: 'D 1.2' }],
    });
  });

  it('GET /action-plan groups rows by priority', async () => {
    const res = await get('/action-plan');
    expect(await res.json()).toMatchObject({
      critical: [{ code: 'D 1.1' }],
      high: [{ code: 'D 2.1' }],
      medium: [],
      matrix: [
        { code: 'D 1.1', quadrant: 'fill-in' },
        { code: 'D 2.1', quadrant: 'fill-in' },
      ],
    });
  });

  // --- LLM ---

  it('POST /recommendations returns the provider text', async () => {
    const res = await send('POST', '/recommendations', {});
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'success',
      text: 'Mock recommendations',
      provider: 'llama_cpp',
      model: 'local-model',
    });
    expect(llama.calls).toHaveLength(1);
    expect(llama.calls[0].config).toEqual({
      provider: 'llama_cpp',
      model: 'local-model',
      baseUrl: 'http://localhost:8080',
    });
  });

  it('POST /recommendations reports an unsupported provider as a failure result', async () => {
    const res = await send('POST', '/recommendations', { provider: 'gemini' });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'failure',
      error: { kind: 'UnsupportedProvider', provider: 'gemini' },
    });
    expect(llama.calls).toHaveLength(0);
  });

  it('POST /recommendations rejects a non-string model', async () => {
    const res = await send('POST', '/recommendations', { model: 7 });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: 'model must be a string' } });
  });

  it('POST /llm/test passes the requested model through', async () => {
    const res = await send('POST', '/llm/test', { model: 'tiny' });
    expect(await res.json()).toMatchObject({ status: 'success', model: 'tiny' });
    expect(llama.calls[0].config.model).toBe('tiny');
  });

  // --- exports ---

  it('POST /exports/:kind writes the workbook', async () => {
    const res = await send('POST', '/exports/action-plan');
    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({ kind: 'action-plan', sheets: ['Action Plan'] });
    expect(exportWriter.written.size).toBe(1);
  });

  it('POST /exports/:kind rejects an unknown kind', async () => {
    const res = await send('POST', '/exports/pdf');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: 'INVALID_REQUEST',
        message: 'kind must be one of: executive-summary, detailed-report, action-plan',
        details: { kind: 'pdf' },
      },
    });
  });

  // --- session and cycles ---

  it('POST /session/save stamps the save time', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-05-04T10:00:00.000Z'));

    const res = await send('POST', '/session/save');
    expect(await res.json()).toEqual({ lastSaved: '2026-05-04T10:00:00.000Z' });

    const overview = await get('/overview');
    expect(await overview.json()).toMatchObject({ lastSaved: '2026-05-04T10:00:00.000Z' });
  });

  it('POST /session/reset restores default ratings', async () => {
    await send('PATCH', '/ratings/D%201.1', { field: 'current', value: 4 });
    const res = await send('POST', '/session/reset');
    expect(await res.json()).toMatchObject({ overallScore: 5 / 3, cycle: 1, lastSaved: null });
  });

  it('POST /session/import restores ratings from a detailed report', async () => {
    await send('PATCH', '/ratings/D%201.1', { field: 'current', value: 3 });
    await send('PATCH', '/ratings/D%202.1', { field: 'actionItems', value: 'Write the policy' });
    await send('POST', '/exports/detailed-report');
    const [workbook] = exportWriter.written.values();

    await send('POST', '/session/reset');
    const res = await send('POST', '/session/import', workbook);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ imported: 3 });

    expect(await (await get('/ratings/D%201.1')).json()).toMatchObject({ current: 3 });
    expect(await (await get('/ratings/D%202.1')).json()).toMatchObject({
      actionItems: 'Write the policy',
    });
  });

  it('POST /session/import rejects a workbook without the assessment sheet', async () => {
    const res = await send('POST', '/session/import', { title: 'Empty', sheets: [] });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { message: 'Workbook has no "Full Assessment" sheet' },
    });
  });

  it('POST /cycles records the cycle and GET /cycles lists it', async () => {
    const created = await send('POST', '/cycles');
    expect(created.status).toBe(201);
    expect(await created.json()).toMatchObject({
      cycle: 2,
      recorded: { cycle: 1, overallScore: 1.67, targetScore: 3.33, criticalGaps: 2 },
    });

    const res = await get('/cycles');
    expect(await res.json()).toMatchObject({ cycle: 2, history: [{ cycle: 1 }] });
  });

  // --- routing ---

  it('answers CORS preflight with 204', async () => {
    const res = await send('OPTIONS', '/overview');
    expect(res.status).toBe(204);
    expect(res.headers.get('Access-Control-Allow-Methods')).toBe('GET, POST, PATCH, OPTIONS');
  });

  it('adds CORS headers to routed responses', async () => {
    const res = await get('/overview');
    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
  });

  it('returns 405 with Allow for a known path and wrong method', async () => {
    const res = await send('DELETE', '/ratings/D%201.1');
    expect(res.status).toBe(405);
    expect(res.headers.get('Allow')).toBe('GET, PATCH');
  });

  it('returns 404 for an unknown path', async () => {
    const res = await get('/nowhere');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'NOT_FOUND', message: 'No route matches GET /api/v1/nowhere' },
    });
  });
});
