/**
 * Derived assessment rows: ratings joined with the catalog, plus gap and priority.
 * Recomputed on every read; nothing here is stored.
 */

import type { AssessmentRow, Domain, Question, Rating } from '../types/models.js';
import { InvariantViolationError } from '../errors.js';
import { priorityOf } from './priority.js';

export function deriveRow(rating: Rating, question: Question, domain: Domain): AssessmentRow {
  const gap = rating.target - rating.current;

  return {
    ...rating,
    prompt: question.prompt,
    domainId: domain.id,
    domainTitle: domain.title,
    section: domain.section,
    gap,
    priority: priorityOf(gap, rating.current),
  };
}

/**
 * Join ratings to questions in catalog order.
 * A question without a rating (or a rating for an unknown code) is a
 * corrupted session, not a user error.
 */
export function deriveRows(
  ratings: readonly Rating[],
  questions: readonly Question[],
  domains: readonly Domain[]
): AssessmentRow[] {
  const byCode = new Map(ratings.map((r) => [r.code, r]));
  const domainById = new Map(domains.map((d) => [d.id, d]));

  if (byCode.size !== questions.length) {
    throw new InvariantViolationError('Ratings do not match the question catalog', {
      ratings: byCode.size,
      questions: questions.length,
    });
  }

  return questions.map((question) => {
    const rating = byCode.get(question.code);
    const domain = domainById.get(question.domainId);
    if (!rating) {
      throw new InvariantViolationError(`No rating for question ${question.code}`);
    }
    if (!domain) {
      throw new InvariantViolationError(`Unknown domain ${question.domainId} for ${question.code}`);
    }
    return deriveRow(rating, question, domain);
  });
}
