/**
 * Small helpers shared by the endpoint modules.
 */

import { ValidationError } from '../errors.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}

/** Last path segment, URI-decoded (question codes contain spaces). */
export function lastPathSegment(req: Request): string {
  const parts = new URL(req.url).pathname.replace(/\/+$/, '').split('/');
  const segment = parts[parts.length - 1] ?? '';
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new ValidationError(`Malformed path segment: ${segment}`);
  }
}

export function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}
