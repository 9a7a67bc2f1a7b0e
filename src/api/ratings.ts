/**
 * Rating endpoints.
 * GET   /api/v1/ratings        — All ratings in catalog order
 * GET   /api/v1/ratings/:code  — One rating
 * PATCH /api/v1/ratings/:code  — Set one field: { field, value }
 */

import { pipeline, errorHandler, validateBody, readJsonBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { RATING_FIELDS } from '../types/models.js';
import { jsonResponse, lastPathSegment } from './http.js';

const updateSchema: BodySchema = {
  field: { type: 'string', required: true, enum: RATING_FIELDS },
  value: { type: 'scalar', required: true },
};

export function createRatingHandlers(container: Container) {
  const list: Handler = pipeline(container.logging, errorHandler)(async () => {
    return jsonResponse({ ratings: await container.assessmentService.listRatings() });
  });

  const getByCode: Handler = pipeline(container.logging, errorHandler)(async (req) => {
    return jsonResponse(await container.assessmentService.getRating(lastPathSegment(req)));
  });

  const update: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(updateSchema)
  )(async (req) => {
    const body = await readJsonBody(req);
    const field = typeof body.field === 'string' ? body.field : '';

    const rating = await container.assessmentService.setRatingField(
      lastPathSegment(req),
      field,
      body.value
    );

    return jsonResponse(rating);
  });

  return { list, getByCode, update };
}
