/**
 * Catalog endpoint.
 * GET /api/v1/questions — Domains and questions with their default levels
 * GET /api/v1/domains   — Per-domain averages and Critical/High counts
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { DomainsResponse } from '../types/api.js';
import { jsonResponse } from './http.js';

export function createQuestionHandlers(container: Container) {
  const list: Handler = pipeline(container.logging, errorHandler)(async () => {
    return new Response(JSON.stringify(container.assessmentService.listQuestions()), {
      status: 200,
      headers: {
        'Content-Type': 'application/json',
        'Cache-Control': 'public, max-age=3600',
      },
    });
  });

  const domains: Handler = pipeline(container.logging, errorHandler)(async () => {
    const body: DomainsResponse = { domains: await container.assessmentService.getDomainSummaries() };
    return jsonResponse(body);
  });

  return { list, domains };
}
