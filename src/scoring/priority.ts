/**
 * Priority tiers from gap and current maturity.
 * Rules are evaluated in order; the first match wins.
 */

import type { MatrixScore, Priority, Quadrant } from '../types/models.js';

/**
 * - gap >= 3                    → Critical
 * - gap >= 2 and current <= 1   → Critical
 * - gap >= 2                    → High
 * - gap >= 1                    → Medium
 * - otherwise                   → Low
 *
 * Non-finite input yields `Unknown` rather than a computed tier.
 */
export function priorityOf(gap: number | null | undefined, current: number | null | undefined): Priority {
  if (gap == null || current == null || !Number.isFinite(gap) || !Number.isFinite(current)) {
    return 'Unknown';
  }
  if (gap >= 3) return 'Critical';
  if (gap >= 2 && current <= 1) return 'Critical';
  if (gap >= 2) return 'High';
  if (gap >= 1) return 'Medium';
  return 'Low';
}

export function isCriticalOrHigh(priority: Priority): boolean {
  return priority === 'Critical' || priority === 'High';
}

/**
 * Benefit/effort quadrant. Effort is scored inversely (2 = minimal effort),
 * so high benefit at minimal effort is a quick win.
 */
export function quadrantOf(benefit: MatrixScore, effort: MatrixScore): Quadrant {
  if (benefit === 2 && effort === 2) return 'quick-win';
  if (benefit === 2) return 'strategic';
  return 'fill-in';
}
