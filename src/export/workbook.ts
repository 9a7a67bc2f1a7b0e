/**
 * Spreadsheet-style export documents.
 * A workbook is a list of named sheets, each a header row plus data rows.
 * Cell layout is presentation; the writer decides the file format.
 */

import type { AssessmentRow, DomainSummary, MatrixScore, Rating } from '../types/models.js';
import { isMatrixScore, isMaturityLevel } from '../types/models.js';
import { ValidationError } from '../errors.js';

export type CellValue = string | number | null;

export interface Sheet {
  name: string;
  columns: string[];
  rows: CellValue[][];
}

export interface Workbook {
  title: string;
  sheets: Sheet[];
}

export const FULL_ASSESSMENT_SHEET = 'Full Assessment';

const BENEFIT_LABELS: Record<MatrixScore, string> = { 0: 'Minimal', 1: 'Moderate', 2: 'Significant' };
// Effort runs the other way: 2 means little effort
const EFFORT_LABELS: Record<MatrixScore, string> = { 0: 'Significant', 1: 'Moderate', 2: 'Minimal' };

const DETAIL_COLUMNS = [
  'Code',
  'Question',
  'Section',
  'Section_Name',
  'Current',
  'Target',
  'Gap',
  'Priority',
  'Action_Items',
  'Benefit',
  'Effort',
];

const DOMAIN_COLUMNS = [
  'Section',
  'Section_Name',
  'Avg_Current',
  'Avg_Target',
  'Avg_Gap',
  'Questions',
  'Critical_High',
];

const PRIORITY_COLUMNS = ['Code', 'Question', 'Current', 'Target', 'Gap', 'Priority', 'Action_Items'];

const ACTION_PLAN_COLUMNS = [
  'Code',
  'Question',
  'Section_Name',
  'Current',
  'Target',
  'Gap',
  'Priority',
  'Action_Items',
  'Benefit',
  'Effort',
  'Benefit_Label',
  'Effort_Label',
];

export function benefitLabel(score: MatrixScore): string {
  return BENEFIT_LABELS[score];
}

export function effortLabel(score: MatrixScore): string {
  return EFFORT_LABELS[score];
}

export function domainSummarySheet(name: string, summaries: readonly DomainSummary[]): Sheet {
  return {
    name,
    columns: DOMAIN_COLUMNS,
    rows: summaries.map((d) => [
      d.section,
      d.title,
      d.avgCurrent,
      d.avgTarget,
      d.avgGap,
      d.questions,
      d.criticalHigh,
    ]),
  };
}

export function fullAssessmentSheet(rows: readonly AssessmentRow[]): Sheet {
  return {
    name: FULL_ASSESSMENT_SHEET,
    columns: DETAIL_COLUMNS,
    rows: rows.map((r) => [
      r.code,
      r.prompt,
      r.section,
      r.domainTitle,
      r.current,
      r.target,
      r.gap,
      r.priority,
      r.actionItems,
      r.benefit,
      r.effort,
    ]),
  };
}

export function priorityActionsSheet(rows: readonly AssessmentRow[]): Sheet {
  return {
    name: 'Priority Actions',
    columns: PRIORITY_COLUMNS,
    rows: rows.map((r) => [r.code, r.prompt, r.current, r.target, r.gap, r.priority, r.actionItems]),
  };
}

export function actionPlanSheet(rows: readonly AssessmentRow[]): Sheet {
  return {
    name: 'Action Plan',
    columns: ACTION_PLAN_COLUMNS,
    rows: rows.map((r) => [
      r.code,
      r.prompt,
      r.domainTitle,
      r.current,
      r.target,
      r.gap,
      r.priority,
      r.actionItems,
      r.benefit,
      r.effort,
      benefitLabel(r.benefit),
      effortLabel(r.effort),
    ]),
  };
}

/**
 * Recover ratings from a detailed report's Full Assessment sheet.
 * Columns are located by header, so column order may change between versions.
 */
export function readRatingsFromWorkbook(workbook: Workbook): Rating[] {
  const sheet = workbook.sheets.find((s) => s.name === FULL_ASSESSMENT_SHEET);
  if (!sheet) {
    throw new ValidationError(`Workbook has no "${FULL_ASSESSMENT_SHEET}" sheet`);
  }

  const col = (name: string): number => {
    const index = sheet.columns.indexOf(name);
    if (index === -1) {
      throw new ValidationError(`Sheet "${sheet.name}" has no ${name} column`);
    }
    return index;
  };

  const code = col('Code');
  const current = col('Current');
  const target = col('Target');
  const actionItems = col('Action_Items');
  const benefit = col('Benefit');
  const effort = col('Effort');

  return sheet.rows.map((row, i): Rating => {
    const values = {
      code: row[code],
      current: row[current],
      target: row[target],
      actionItems: row[actionItems],
      benefit: row[benefit],
      effort: row[effort],
    };

    if (
      typeof values.code !== 'string' ||
      typeof values.actionItems !== 'string' ||
      !isMaturityLevel(values.current) ||
      !isMaturityLevel(values.target) ||
      !isMatrixScore(values.benefit) ||
      !isMatrixScore(values.effort)
    ) {
      throw new ValidationError(`Row ${i + 1} of "${sheet.name}" is not a valid rating`);
    }

    return {
      code: values.code,
      current: values.current,
      target: values.target,
      actionItems: values.actionItems,
      benefit: values.benefit,
      effort: values.effort,
    };
  });
}

/** Check the shape of a workbook read back from storage. */
export function parseWorkbook(data: unknown): Workbook {
  if (!isRecord(data) || typeof data.title !== 'string' || !Array.isArray(data.sheets)) {
    throw new ValidationError('Not a workbook: expected { title, sheets }');
  }

  const sheets = data.sheets.map((sheet: unknown, i: number): Sheet => {
    if (
      !isRecord(sheet) ||
      typeof sheet.name !== 'string' ||
      !isStringArray(sheet.columns) ||
      !Array.isArray(sheet.rows)
    ) {
      throw new ValidationError(`Sheet ${i + 1} is malformed`);
    }
    const rows = sheet.rows.map((row: unknown, r: number): CellValue[] => {
      if (!Array.isArray(row) || !row.every(isCellValue)) {
        throw new ValidationError(`Row ${r + 1} of sheet "${String(sheet.name)}" is malformed`);
      }
      return row;
    });
    return { name: sheet.name, columns: sheet.columns, rows };
  });

  return { title: data.title, sheets };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isCellValue(value: unknown): value is CellValue {
  return value === null || typeof value === 'string' || typeof value === 'number';
}
