/**
 * Session and cycle endpoints.
 * POST /api/v1/session/save   — Stamp the last-saved time
 * POST /api/v1/session/reset  — Discard ratings and history, restore defaults
 * POST /api/v1/session/import — Restore ratings from a detailed-report workbook
 * GET  /api/v1/cycles         — Current cycle and history
 * POST /api/v1/cycles         — Record the current cycle and start the next
 */

import { pipeline, errorHandler, validateBody, readJsonBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { parseWorkbook, readRatingsFromWorkbook } from '../export/workbook.js';
import { jsonResponse } from './http.js';

const importSchema: BodySchema = {
  title: { type: 'string', required: true, maxLength: 200 },
  sheets: { type: 'array', required: true },
};

export function createSessionHandlers(container: Container) {
  const service = container.assessmentService;

  const save: Handler = pipeline(container.logging, errorHandler)(async () => {
    return jsonResponse({ lastSaved: service.saveProgress() });
  });

  const reset: Handler = pipeline(container.logging, errorHandler)(async () => {
    await service.reset();
    return jsonResponse(await service.getOverview());
  });

  const importWorkbook: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(importSchema)
  )(async (req) => {
    const ratings = readRatingsFromWorkbook(parseWorkbook(await readJsonBody(req)));
    return jsonResponse({ imported: await service.importRatings(ratings) });
  });

  const history: Handler = pipeline(container.logging, errorHandler)(async () => {
    return jsonResponse(await service.getHistory());
  });

  const newCycle: Handler = pipeline(container.logging, errorHandler)(async () => {
    return jsonResponse(await service.startNewCycle(), 201);
  });

  return { save, reset, importWorkbook, history, newCycle };
}
