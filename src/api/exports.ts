/**
 * Export endpoint.
 * POST /api/v1/exports/:kind — Write an executive-summary, detailed-report
 * or action-plan workbook to the export directory
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { ExportKind, ExportResponse } from '../types/api.js';
import { EXPORT_KINDS } from '../types/api.js';
import { ValidationError } from '../errors.js';
import { jsonResponse, lastPathSegment } from './http.js';

export function createExportHandlers(container: Container) {
  const create: Handler = pipeline(container.logging, errorHandler)(async (req) => {
    const kind = lastPathSegment(req);
    if (!isExportKind(kind)) {
      throw new ValidationError(`kind must be one of: ${EXPORT_KINDS.join(', ')}`, { kind });
    }

    const result = await container.exportService.export(kind);
    const body: ExportResponse = {
      kind: result.kind,
      location: result.location,
      sheets: result.workbook.sheets.map((s) => s.name),
    };

    return jsonResponse(body, 201);
  });

  return { create };
}

function isExportKind(value: string): value is ExportKind {
  return EXPORT_KINDS.some((k) => k === value);
}
