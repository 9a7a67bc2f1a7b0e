/**
 * Highest-gap selection, shared by the dashboard panel and the LLM prompt.
 * Each caller passes its own limit.
 */

import type { AssessmentRow } from '../types/models.js';

/** Larger gap first, then lower current level first. */
export function compareByGap(a: AssessmentRow, b: AssessmentRow): number {
  if (a.gap !== b.gap) return b.gap - a.gap;
  return a.current - b.current;
}

/**
 * Rows with a positive gap, ordered by `compareByGap`, first `n` kept.
 * Ties beyond gap and current keep catalog order (Array#sort is stable).
 */
export function topGapItems(rows: readonly AssessmentRow[], n: number): AssessmentRow[] {
  if (n <= 0) return [];
  return rows
    .filter((r) => r.gap > 0)
    .sort(compareByGap)
    .slice(0, n);
}

/** Every row, largest gap first; catalog order among equal gaps. */
export function sortByGapDescending(rows: readonly AssessmentRow[]): AssessmentRow[] {
  return [...rows].sort((a, b) => b.gap - a.gap);
}
