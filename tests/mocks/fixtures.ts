import type { AssessmentRow, Domain, Question, Rating } from '../../src/types/models.js';
import { priorityOf } from '../../src/scoring/priority.js';
import { QuestionCatalog } from '../../src/catalog/QuestionCatalog.js';

/** Derived row with gap and priority computed from current/target. */
export function makeRow(overrides: Partial<Rating> & { code: string }): AssessmentRow {
  const current = overrides.current ?? 2;
  const target = overrides.target ?? 4;
  const gap = target - current;

  return {
    code: overrides.code,
    current,
    target,
    actionItems: overrides.actionItems ?? '',
    benefit: overrides.benefit ?? 1,
    effort: overrides.effort ?? 1,
    prompt: `Prompt for ${overrides.code}`,
    domainId: 'd1',
    domainTitle: 'Domain One',
    section: 'D 1',
    gap,
    priority: priorityOf(gap, current),
  };
}

export const SMALL_DOMAINS: Domain[] = [
  { id: 'd1', section: 'D 1', title: 'Domain One' },
  { id: 'd2', section: 'D 2', title: 'Domain Two' },
];

export const SMALL_QUESTIONS: Question[] = [
  { code: 'D 1.1', prompt: 'First', description: '', domainId: 'd1', defaultCurrent: 1, defaultTarget: 4 },
  { code: 'D 1.2', prompt: 'Second', description: '', domainId: 'd1', defaultCurrent: 2, defaultTarget: 2 },
  { code: 'D 2.1', prompt: 'Third', description: '', domainId: 'd2', defaultCurrent: 2, defaultTarget: 4 },
];

/** Three questions over two domains. Defaults: gaps 3, 0, 2. */
export function smallCatalog(): QuestionCatalog {
  return new QuestionCatalog(SMALL_DOMAINS, SMALL_QUESTIONS);
}
