/**
 * Domain and overall aggregates over derived rows.
 */

import type { AssessmentRow, Domain, DomainSummary, Priority } from '../types/models.js';
import { InvariantViolationError } from '../errors.js';
import { isCriticalOrHigh } from './priority.js';

export interface OverallScore {
  overallScore: number;
  targetScore: number;
  /** Mean current level as a share of the top level (4). */
  progressPercent: number;
  questions: number;
  criticalHigh: number;
}

function mean(values: readonly number[], what: string): number {
  if (values.length === 0) {
    throw new InvariantViolationError(`Cannot average ${what} over an empty set`);
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * One summary per domain, in the order the domains are given.
 * Throws when a domain has no rows: the catalog guarantees every domain has questions.
 */
export function aggregateByDomain(
  rows: readonly AssessmentRow[],
  domains: readonly Domain[]
): DomainSummary[] {
  return domains.map((domain) => {
    const inDomain = rows.filter((r) => r.domainId === domain.id);

    if (inDomain.length === 0) {
      throw new InvariantViolationError(`Domain ${domain.section} has no questions`, {
        domainId: domain.id,
      });
    }

    return {
      domainId: domain.id,
      section: domain.section,
      title: domain.title,
      avgCurrent: mean(inDomain.map((r) => r.current), 'current'),
      avgTarget: mean(inDomain.map((r) => r.target), 'target'),
      avgGap: mean(inDomain.map((r) => r.gap), 'gap'),
      questions: inDomain.length,
      criticalHigh: inDomain.filter((r) => isCriticalOrHigh(r.priority)).length,
    };
  });
}

export function overallScore(rows: readonly AssessmentRow[]): OverallScore {
  const current = mean(rows.map((r) => r.current), 'current');

  return {
    overallScore: current,
    targetScore: mean(rows.map((r) => r.target), 'target'),
    progressPercent: (current / 4) * 100,
    questions: rows.length,
    criticalHigh: rows.filter((r) => isCriticalOrHigh(r.priority)).length,
  };
}

export function priorityBreakdown(rows: readonly AssessmentRow[]): Record<Priority, number> {
  const counts: Record<Priority, number> = { Critical: 0, High: 0, Medium: 0, Low: 0, Unknown: 0 };
  for (const row of rows) {
    counts[row.priority] += 1;
  }
  return counts;
}
