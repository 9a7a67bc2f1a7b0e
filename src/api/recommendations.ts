/**
 * LLM endpoints.
 * POST /api/v1/recommendations — Recommendations for the largest gaps
 * POST /api/v1/llm/test        — Connection test against the selected provider
 *
 * Body (all optional): { provider, model, baseUrl, apiKey }.
 * Provider failures come back as 200 with status "failure".
 */

import { pipeline, errorHandler, validateBody, readJsonBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { ProviderRequest, RecommendationOutcome } from '../types/api.js';
import type { LlmFailure } from '../providers/ILlmProvider.js';
import { resolveProviderConfig } from '../config.js';
import { jsonResponse, optionalString } from './http.js';

const providerSchema: BodySchema = {
  provider: { type: 'string', required: false, maxLength: 50 },
  model: { type: 'string', required: false, maxLength: 200 },
  baseUrl: { type: 'string', required: false, maxLength: 2000 },
  apiKey: { type: 'string', required: false, maxLength: 500 },
};

export function createRecommendationHandlers(container: Container) {
  const generate: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(providerSchema)
  )(async (req) => {
    const resolved = resolveProviderConfig(await readProviderRequest(req), container.config);
    if (!resolved.ok) {
      return jsonResponse(failed(resolved.error));
    }

    const rows = await container.assessmentService.getRows();
    return jsonResponse(
      await container.recommendationService.generateRecommendations(rows, resolved.config)
    );
  });

  const test: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(providerSchema)
  )(async (req) => {
    const resolved = resolveProviderConfig(await readProviderRequest(req), container.config);
    if (!resolved.ok) {
      return jsonResponse(failed(resolved.error));
    }

    return jsonResponse(await container.recommendationService.testConnection(resolved.config));
  });

  return { generate, test };
}

async function readProviderRequest(req: Request): Promise<ProviderRequest> {
  const body = await readJsonBody(req);
  return {
    provider: optionalString(body.provider),
    model: optionalString(body.model),
    baseUrl: optionalString(body.baseUrl),
    apiKey: optionalString(body.apiKey),
  };
}

function failed(error: LlmFailure): RecommendationOutcome {
  return { status: 'failure', error };
}
