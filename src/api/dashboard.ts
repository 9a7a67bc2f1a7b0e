/**
 * Derived assessment views.
 * GET /api/v1/assessment         — Every question with gap and priority
 * GET /api/v1/overview           — Overall scores, priority counts, cycle
 * GET /api/v1/top-actions?limit= — Largest Critical/High gaps
 * GET /api/v1/gaps               — All rows by gap, largest first
 * GET /api/v1/action-plan        — Priority groups and benefit/effort matrix
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { ValidationError } from '../errors.js';
import { jsonResponse } from './http.js';

export function createDashboardHandlers(container: Container) {
  const service = container.assessmentService;

  const assessment: Handler = pipeline(container.logging, errorHandler)(async () => {
    return jsonResponse({ rows: await service.getRows() });
  });

  const overview: Handler = pipeline(container.logging, errorHandler)(async () => {
    return jsonResponse(await service.getOverview());
  });

  const topActions: Handler = pipeline(container.logging, errorHandler)(async (req) => {
    const limit = parseLimit(new URL(req.url).searchParams.get('limit'));
    return jsonResponse({ items: await service.getTopActions(limit) });
  });

  const gaps: Handler = pipeline(container.logging, errorHandler)(async () => {
    return jsonResponse({ rows: await service.getGapTable() });
  });

  const actionPlan: Handler = pipeline(container.logging, errorHandler)(async () => {
    return jsonResponse(await service.getActionPlan());
  });

  return { assessment, overview, topActions, gaps, actionPlan };
}

/** Absent → service default. Zero is allowed and yields an empty list. */
function parseLimit(raw: string | null): number | undefined {
  if (raw === null || raw.trim() === '') return undefined;

  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new ValidationError('limit must be a non-negative integer', { limit: raw });
  }
  return limit;
}
