/**
 * Export writer interface.
 * Persists a workbook under a base file name and reports where it went.
 */

import type { Workbook } from './workbook.js';

export interface IExportWriter {
  /** File extension the writer appends, e.g. ".json". */
  readonly extension: string;

  /** Write the workbook; resolves with its location (path or URL). */
  write(baseName: string, workbook: Workbook): Promise<string>;
}
