/**
 * Writes workbooks as JSON files into a directory.
 * The directory is created on first write.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { IExportWriter } from './IExportWriter.js';
import type { Workbook } from './workbook.js';

export class JsonWorkbookWriter implements IExportWriter {
  readonly extension = '.json';
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = resolve(dir);
  }

  async write(baseName: string, workbook: Workbook): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const path = join(this.dir, `${baseName}${this.extension}`);
    await writeFile(path, JSON.stringify(workbook, null, 2), 'utf8');
    return path;
  }
}
