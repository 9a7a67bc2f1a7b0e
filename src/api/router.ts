/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic — works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createQuestionHandlers } from './questions.js';
import { createRatingHandlers } from './ratings.js';
import { createDashboardHandlers } from './dashboard.js';
import { createRecommendationHandlers } from './recommendations.js';
import { createExportHandlers } from './exports.js';
import { createSessionHandlers } from './session.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const questions = createQuestionHandlers(container);
  const ratings = createRatingHandlers(container);
  const dashboard = createDashboardHandlers(container);
  const llm = createRecommendationHandlers(container);
  const exportHandlers = createExportHandlers(container);
  const session = createSessionHandlers(container);

  const routes: Route[] = [
    // Catalog
    { method: 'GET', pattern: /^\/api\/v1\/questions\/?$/, handler: questions.list },
    { method: 'GET', pattern: /^\/api\/v1\/domains\/?$/, handler: questions.domains },

    // Ratings
    { method: 'GET', pattern: /^\/api\/v1\/ratings\/?$/, handler: ratings.list },
    { method: 'GET', pattern: /^\/api\/v1\/ratings\/[^/]+\/?$/, handler: ratings.getByCode },
    { method: 'PATCH', pattern: /^\/api\/v1\/ratings\/[^/]+\/?$/, handler: ratings.update },

    // Derived views
    { method: 'GET', pattern: /^\/api\/v1\/assessment\/?$/, handler: dashboard.assessment },
    { method: 'GET', pattern: /^\/api\/v1\/overview\/?$/, handler: dashboard.overview },
    { method: 'GET', pattern: /^\/api\/v1\/top-actions\/?$/, handler: dashboard.topActions },
    { method: 'GET', pattern: /^\/api\/v1\/gaps\/?$/, handler: dashboard.gaps },
    { method: 'GET', pattern: /^\/api\/v1\/action-plan\/?$/, handler: dashboard.actionPlan },

    // LLM
    { method: 'POST', pattern: /^\/api\/v1\/recommendations\/?$/, handler: llm.generate },
    { method: 'POST', pattern: /^\/api\/v1\/llm\/test\/?$/, handler: llm.test },

    // Exports
    { method: 'POST', pattern: /^\/api\/v1\/exports\/[^/]+\/?$/, handler: exportHandlers.create },

    // Session and cycles
    { method: 'POST', pattern: /^\/api\/v1\/session\/save\/?$/, handler: session.save },
    { method: 'POST', pattern: /^\/api\/v1\/session\/reset\/?$/, handler: session.reset },
    { method: 'POST', pattern: /^\/api\/v1\/session\/import\/?$/, handler: session.importWorkbook },
    { method: 'GET', pattern: /^\/api\/v1\/cycles\/?$/, handler: session.history },
    { method: 'POST', pattern: /^\/api\/v1\/cycles\/?$/, handler: session.newCycle },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        const response = await route.handler(req, ctx);
        return addCorsHeaders(response);
      }
    }

    // Check if path matches but method doesn't
    const pathMatches = routes.some((r) => r.pattern.test(url.pathname));
    if (pathMatches) {
      const allowed = routes
        .filter((r) => r.pattern.test(url.pathname))
        .map((r) => r.method)
        .join(', ');

      return new Response(
        JSON.stringify({
          error: {
            code: 'INVALID_REQUEST',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: allowed,
            ...corsHeaders(),
          },
        }
      );
    }

    return new Response(
      JSON.stringify({
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
        },
      }),
      {
        status: 404,
        headers: { 'Content-Type': 'application/json', ...corsHeaders() },
      }
    );
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, PATCH, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
